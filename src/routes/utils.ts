import type { Context } from 'hono';
import { z } from 'zod';
import { httpStatusFor, isStakingError } from '../staking/errors';
import { moduleLogger } from '../utils/logger';
import { isValidWallet } from '../utils/wallet';

const log = moduleLogger('http');

export const walletSchema = z.string().refine(isValidWallet, { message: 'Invalid wallet address' });

// Token amounts travel as base-unit integer strings
export const amountSchema = z
  .string()
  .regex(/^[0-9]+$/, { message: 'Amount must be a non-negative integer string' })
  .transform((value) => BigInt(value));

export type ParseResult<T> = { ok: true; data: T } | { ok: false; response: Response };

export async function parseBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<ParseResult<z.output<T>>> {
  const body: unknown = await c.req.json().catch(() => null);
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      response: c.json({
        success: false,
        error: 'Invalid request',
        details: parsed.error.flatten(),
      }, 400),
    };
  }
  return { ok: true, data: parsed.data };
}

export function errorResponse(c: Context, error: unknown): Response {
  if (isStakingError(error)) {
    return c.json({
      success: false,
      error: error.message,
      code: error.code,
      details: error.details ?? null,
    }, httpStatusFor(error));
  }

  log.error('Unhandled error in route', { path: c.req.path, error });
  return c.json({ success: false, error: 'Internal server error' }, 500);
}
