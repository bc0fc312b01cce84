import { MemoryLedgerStore } from '../src/core/ledger';
import { Runtime } from '../src/core/runtime';
import { Disperser } from '../src/core/disperser';
import { generateAddress } from '../src/utils/address';

export const DEFAULT_GAS_LIMIT = 30_000_000;

export function setup(gasLimit: number = DEFAULT_GAS_LIMIT) {
  const store = new MemoryLedgerStore();
  const runtime = new Runtime(store, { gasLimit });
  const disperser = new Disperser(runtime, generateAddress());
  return { store, runtime, disperser };
}

export function addresses(count: number): string[] {
  return Array.from({ length: count }, () => generateAddress());
}

export async function balances(runtime: Runtime, owners: string[]): Promise<bigint[]> {
  const result: bigint[] = [];
  for (const owner of owners) {
    result.push(await runtime.balanceOf(owner));
  }
  return result;
}

export async function tokenBalances(runtime: Runtime, token: string, owners: string[]): Promise<bigint[]> {
  const result: bigint[] = [];
  for (const owner of owners) {
    result.push(await runtime.tokenBalanceOf(token, owner));
  }
  return result;
}
