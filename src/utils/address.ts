import { Keypair, PublicKey } from '@solana/web3.js';

/**
 * Generate a fresh random address
 */
export function generateAddress(): string {
  return Keypair.generate().publicKey.toBase58();
}

/**
 * Validate address string
 */
export function isValidAddress(address: string): boolean {
  try {
    new PublicKey(address);
    return true;
  } catch {
    return false;
  }
}

/**
 * Format address for display (shortened)
 */
export function formatAddress(
  address: PublicKey | string,
  start: number = 4,
  end: number = 4
): string {
  const key = address.toString();
  return `${key.slice(0, start)}...${key.slice(-end)}`;
}
