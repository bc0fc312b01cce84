import { MemoryLedgerStore } from '../src/core/ledger';
import { addresses } from './helpers';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('MemoryLedgerStore', () => {
  const [alice, bob, token] = addresses(3);

  it('commits writes when the transaction resolves', async () => {
    const store = new MemoryLedgerStore();

    await store.transaction(async state => {
      await state.setBalance(alice, 100n);
      await state.setTokenBalance(token, bob, 7n);
      await state.setAllowance(token, alice, bob, 3n);
    });

    const read = await store.transaction(async state => [
      await state.getBalance(alice),
      await state.getTokenBalance(token, bob),
      await state.getAllowance(token, alice, bob),
    ]);
    expect(read).toEqual([100n, 7n, 3n]);
  });

  it('discards every write when the transaction rejects', async () => {
    const store = new MemoryLedgerStore();
    store.seedBalance(alice, 100n);

    await expect(
      store.transaction(async state => {
        await state.setBalance(alice, 40n);
        await state.setBalance(bob, 60n);
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    const read = await store.transaction(async state => [
      await state.getBalance(alice),
      await state.getBalance(bob),
    ]);
    expect(read).toEqual([100n, 0n]);
  });

  it('reads its own staged writes', async () => {
    const store = new MemoryLedgerStore();

    const seen = await store.transaction(async state => {
      await state.setBalance(alice, 5n);
      return state.getBalance(alice);
    });

    expect(seen).toBe(5n);
  });

  describe('savepoint', () => {
    it('drops the nested writes and re-throws when the scope fails', async () => {
      const store = new MemoryLedgerStore();

      const seen = await store.transaction(async state => {
        await state.setBalance(alice, 10n);
        const failure = await state
          .savepoint(async inner => {
            await inner.setBalance(alice, 20n);
            await inner.setBalance(bob, 1n);
            throw new Error('nested');
          })
          .catch((error: Error) => error.message);
        return [failure, await state.getBalance(alice), await state.getBalance(bob)];
      });

      expect(seen).toEqual(['nested', 10n, 0n]);
    });

    it('folds nested writes into the transaction when the scope succeeds', async () => {
      const store = new MemoryLedgerStore();

      await store.transaction(async state => {
        await state.savepoint(async inner => {
          await inner.setBalance(alice, 20n);
          await inner.savepoint(async deeper => deeper.setBalance(bob, 2n));
        });
      });

      const read = await store.transaction(async state => [
        await state.getBalance(alice),
        await state.getBalance(bob),
      ]);
      expect(read).toEqual([20n, 2n]);
    });
  });

  it('rejects negative values', async () => {
    const store = new MemoryLedgerStore();

    await expect(
      store.transaction(state => state.setBalance(alice, -1n))
    ).rejects.toThrow(RangeError);
    expect(() => store.seedBalance(alice, -1n)).toThrow(RangeError);
  });

  it('serialises concurrent transactions', async () => {
    const store = new MemoryLedgerStore();

    const increment = () =>
      store.transaction(async state => {
        const current = await state.getBalance(alice);
        await tick();
        await state.setBalance(alice, current + 1n);
      });

    await Promise.all([increment(), increment(), increment()]);

    expect(await store.transaction(state => state.getBalance(alice))).toBe(3n);
  });

  it('keeps no entries for zeroed balances', async () => {
    const store = new MemoryLedgerStore();
    store.seedBalance(alice, 10n);
    expect(store.size).toBe(1);

    await store.transaction(state => state.setBalance(alice, 0n));

    expect(store.size).toBe(0);
  });
});
