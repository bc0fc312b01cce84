import { GAS } from '../src/constants/gas';
import { DisperseError } from '../src/core/errors';
import { LedgerState, LedgerStore } from '../src/core/ledger';
import { ReceiveContext, Runtime } from '../src/core/runtime';
import { addresses, balances, setup } from './helpers';

describe('Runtime', () => {
  const [caller, contract, plain, rejecter] = addresses(4);

  describe('call', () => {
    it('moves the attached value to the target before running the body', async () => {
      const { store, runtime } = setup();
      store.seedBalance(caller, 100n);

      const seen = await runtime.call(caller, contract, 40n, async ctx => ({
        value: ctx.value,
        self: ctx.self,
        held: await ctx.state.getBalance(contract),
      }));

      expect(seen).toEqual({ value: 40n, self: contract, held: 40n });
      expect(await balances(runtime, [caller, contract])).toEqual([60n, 40n]);
    });

    it('fails with INSUFFICIENT_BALANCE when the caller cannot cover the value', async () => {
      const { store, runtime } = setup();
      store.seedBalance(caller, 10n);
      const body = jest.fn(async () => 'ran');

      await expect(runtime.call(caller, contract, 11n, body)).rejects.toMatchObject({
        code: 'INSUFFICIENT_BALANCE',
      });
      expect(body).not.toHaveBeenCalled();
      expect(await balances(runtime, [caller, contract])).toEqual([10n, 0n]);
    });

    it('rolls back the attached value when the body throws', async () => {
      const { store, runtime } = setup();
      store.seedBalance(caller, 100n);

      await expect(
        runtime.call(caller, contract, 50n, async ctx => {
          await runtime.pushValue(ctx, plain, 20n);
          throw new Error('abort');
        })
      ).rejects.toThrow('abort');

      expect(await balances(runtime, [caller, contract, plain])).toEqual([100n, 0n, 0n]);
    });

    it('refuses a negative attached value', async () => {
      const { store, runtime } = setup();
      store.seedBalance(contract, 10n);
      const body = jest.fn(async () => 'ran');

      await expect(runtime.call(caller, contract, -10n, body)).rejects.toMatchObject({
        code: 'INVALID_AMOUNT',
      });
      expect(body).not.toHaveBeenCalled();
      expect(await balances(runtime, [caller, contract])).toEqual([0n, 10n]);
    });

    it('aborts with OUT_OF_GAS when the call exhausts its own budget', async () => {
      const { store, runtime } = setup(GAS.CALL_BASE + GAS.VALUE_TRANSFER - 1);
      store.seedBalance(caller, 100n);

      await expect(
        runtime.call(caller, contract, 10n, ctx => runtime.pushValue(ctx, plain, 10n))
      ).rejects.toMatchObject({ code: 'OUT_OF_GAS' });

      expect(await balances(runtime, [caller, contract, plain])).toEqual([100n, 0n, 0n]);
    });
  });

  describe('pushValue', () => {
    it('reports a rejected push as false and keeps the call going', async () => {
      const { store, runtime } = setup();
      store.seedBalance(caller, 100n);
      runtime.registerReceiver(rejecter, () => false);

      const results = await runtime.call(caller, contract, 100n, async ctx => [
        await runtime.pushValue(ctx, rejecter, 10n),
        await runtime.pushValue(ctx, plain, 10n),
      ]);

      expect(results).toEqual([false, true]);
      expect(await balances(runtime, [contract, plain, rejecter])).toEqual([90n, 10n, 0n]);
    });

    it('treats a receiver that throws as a rejection', async () => {
      const { store, runtime } = setup();
      store.seedBalance(caller, 10n);
      runtime.registerReceiver(rejecter, () => {
        throw new Error('no thanks');
      });

      const pushed = await runtime.call(caller, contract, 10n, ctx =>
        runtime.pushValue(ctx, rejecter, 10n)
      );

      expect(pushed).toBe(false);
      expect(await balances(runtime, [contract, rejecter])).toEqual([10n, 0n]);
    });

    it('returns false when the sender is short of balance', async () => {
      const { store, runtime } = setup();
      store.seedBalance(caller, 5n);

      const pushed = await runtime.call(caller, contract, 5n, ctx =>
        runtime.pushValue(ctx, plain, 6n)
      );

      expect(pushed).toBe(false);
      expect(await balances(runtime, [contract, plain])).toEqual([5n, 0n]);
    });

    it('hands the receiver the push details and the forwarded budget', async () => {
      const { store, runtime } = setup(100_000);
      store.seedBalance(caller, 10n);
      const seen: ReceiveContext[] = [];
      runtime.registerReceiver(plain, ctx => {
        seen.push(ctx);
        ctx.meter.consume(500);
      });

      const gasUsed = await runtime.call(caller, contract, 10n, async ctx => {
        await runtime.pushValue(ctx, plain, 10n);
        return ctx.meter.gasUsed;
      });

      expect(seen).toHaveLength(1);
      expect(seen[0]).toMatchObject({ from: contract, to: plain, value: 10n });
      // 100 000 - 21 000 - 9 000 = 70 000 left; 1/64th (1 093) is held back
      expect(seen[0].meter.limit).toBe(68_907);
      expect(gasUsed).toBe(GAS.CALL_BASE + GAS.VALUE_TRANSFER + 500);
      expect(await runtime.balanceOf(plain)).toBe(10n);
    });

    it('fails the push when the receiver burns through the forwarded gas', async () => {
      const { store, runtime } = setup(100_000);
      store.seedBalance(caller, 10n);
      runtime.registerReceiver(plain, ctx => ctx.meter.consume(1_000_000));

      const outcome = await runtime.call(caller, contract, 10n, async ctx => ({
        pushed: await runtime.pushValue(ctx, plain, 10n),
        gasUsed: ctx.meter.gasUsed,
      }));

      expect(outcome).toEqual({ pushed: false, gasUsed: 21_000 + 9_000 + 68_907 });
      expect(await balances(runtime, [contract, plain])).toEqual([10n, 0n]);
    });

    it('refuses a negative push without moving anything', async () => {
      const { store, runtime } = setup();
      store.seedBalance(caller, 10n);
      store.seedBalance(plain, 50n);

      const pushed = await runtime.call(caller, contract, 10n, ctx =>
        runtime.pushValue(ctx, plain, -50n)
      );

      expect(pushed).toBe(false);
      expect(await balances(runtime, [contract, plain])).toEqual([10n, 50n]);
    });

    it('propagates ledger failures instead of reporting false', async () => {
      const state: LedgerState = {
        getBalance: async () => 100n,
        setBalance: async address => {
          if (address === plain) throw new Error('disk full');
        },
        getTokenBalance: async () => 0n,
        setTokenBalance: async () => undefined,
        getAllowance: async () => 0n,
        setAllowance: async () => undefined,
        savepoint: fn => fn(state),
      };
      const failing: LedgerStore = {
        backend: 'failing',
        transaction: fn => fn(state),
      };
      const runtime = new Runtime(failing, { gasLimit: 100_000 });

      await expect(
        runtime.call(caller, contract, 0n, ctx => runtime.pushValue(ctx, plain, 10n))
      ).rejects.toThrow('disk full');
    });
  });

  describe('tokens', () => {
    it('throws UNKNOWN_TOKEN for an unregistered address', () => {
      const { runtime } = setup();

      expect(() => runtime.getToken(plain)).toThrow(DisperseError);
      expect(() => runtime.getToken(plain)).toThrow(`No token registered at ${plain}`);
    });

    it('marks receivers and tokens as contracts', () => {
      const { runtime } = setup();
      runtime.registerReceiver(rejecter, () => false);

      expect(runtime.isContract(rejecter)).toBe(true);
      expect(runtime.isContract(plain)).toBe(false);
    });
  });
});
