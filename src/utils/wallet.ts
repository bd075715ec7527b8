import { PublicKey } from '@solana/web3.js';
import { z } from 'zod';

export function isWalletAddress(value: string): boolean {
  try {
    return new PublicKey(value).toBase58() === value;
  } catch {
    return false;
  }
}

/** A base58 Solana public key, as staker and admin identities are written */
export const walletAddress = z.string().refine(isWalletAddress, 'Invalid wallet address');
