import { Keypair, PublicKey } from '@solana/web3.js';

/**
 * Accounts are base58 wallet addresses (32-byte ed25519 public keys).
 */
export function isValidWallet(address: string): boolean {
  try {
    return new PublicKey(address).toBase58() === address;
  } catch {
    return false;
  }
}

export function generateWallet(): string {
  return Keypair.generate().publicKey.toBase58();
}
