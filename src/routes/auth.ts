/**
 * Signed Requests
 *
 * State-changing routes act on behalf of the wallet that signed the request.
 * The client signs
 *
 *   `${METHOD} ${path}\n${timestamp}\n${body}`
 *
 * with the wallet's ed25519 key and sends the wallet, the base58 signature and
 * the unix-seconds timestamp as headers. Signatures older than five minutes
 * are refused.
 */

import bs58 from 'bs58';
import nacl from 'tweetnacl';
import { PublicKey } from '@solana/web3.js';
import { createMiddleware } from 'hono/factory';
import { nowSeconds } from '../staking/ledger';
import { moduleLogger } from '../utils/logger';
import { isValidWallet } from '../utils/wallet';

const log = moduleLogger('auth');

export const WALLET_HEADER = 'x-wallet';
export const SIGNATURE_HEADER = 'x-signature';
export const TIMESTAMP_HEADER = 'x-timestamp';
export const SIGNATURE_MAX_AGE = 5 * 60;

export type AuthEnv = {
  Variables: {
    signer: string;
  };
};

export function signedMessage(method: string, path: string, timestamp: number, body: string): string {
  return `${method.toUpperCase()} ${path}\n${timestamp}\n${body}`;
}

export function verifyWalletSignature(wallet: string, message: string, signature: string): boolean {
  if (!isValidWallet(wallet)) return false;

  let signatureBytes: Uint8Array;
  try {
    signatureBytes = bs58.decode(signature);
  } catch {
    return false;
  }
  if (signatureBytes.length !== nacl.sign.signatureLength) return false;

  return nacl.sign.detached.verify(
    new TextEncoder().encode(message),
    signatureBytes,
    new PublicKey(wallet).toBytes()
  );
}

export const requireSignature = createMiddleware<AuthEnv>(async (c, next) => {
  const wallet = c.req.header(WALLET_HEADER);
  const signature = c.req.header(SIGNATURE_HEADER);
  const timestamp = Number(c.req.header(TIMESTAMP_HEADER));

  if (!wallet || !signature || !Number.isInteger(timestamp)) {
    return c.json({ success: false, error: 'Missing signature headers' }, 401);
  }

  if (Math.abs(nowSeconds() - timestamp) > SIGNATURE_MAX_AGE) {
    return c.json({ success: false, error: 'Signature expired' }, 401);
  }

  const body = await c.req.text();
  const message = signedMessage(c.req.method, c.req.path, timestamp, body);
  if (!verifyWalletSignature(wallet, message, signature)) {
    log.warn('Rejected request with invalid signature', { path: c.req.path, wallet });
    return c.json({ success: false, error: 'Invalid signature' }, 401);
  }

  c.set('signer', wallet);
  await next();
});
