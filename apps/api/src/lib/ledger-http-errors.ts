/**
 * Maps ledger domain errors to HTTP responses
 */

import type { Context } from 'hono';
import type { ZodError } from 'zod';
import { OracleReadError, isLedgerError, type LedgerErrorCode } from '@repo/core';

type ErrorStatus = 400 | 409 | 422 | 500 | 502;

// Only `json` is needed, so any route's context fits
type JsonContext = Pick<Context, 'json'>;

export const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, ErrorStatus> = {
  INVALID_AMOUNT: 400,
  INSUFFICIENT_BALANCE: 409,
  CAP_EXCEEDED: 422,
  REENTRANT_CALL: 409,
  TRANSFER_FAILED: 502,
  INVALID_ADDRESS: 500,
};

/**
 * Build the JSON error response for a known error, or return null
 * so the caller can fall through to the global handler
 */
export function ledgerErrorResponse(c: JsonContext, error: unknown): Response | null {
  if (isLedgerError(error)) {
    return c.json({ error: error.message, code: error.code }, LEDGER_ERROR_STATUS[error.code]);
  }
  if (error instanceof OracleReadError) {
    return c.json({ error: error.message, code: 'ORACLE_UNAVAILABLE' }, 502);
  }
  return null;
}

/**
 * zValidator hook: reject invalid input with the zod issues
 */
export function validationHook(
  result: { success: boolean; error?: ZodError },
  c: JsonContext
): Response | undefined {
  if (!result.success) {
    return c.json(
      { error: 'Validation failed', code: 'VALIDATION_FAILED', issues: result.error?.issues ?? [] },
      400
    );
  }
  return undefined;
}
