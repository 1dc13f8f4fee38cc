/**
 * Ledger API schemas for deposits, withdrawals, balances and quotes
 * Used for request/response validation on both sides of the wire
 *
 * Amounts travel as decimal strings of base units (bigint does not fit JSON)
 */

import { z } from 'zod';

export const AssetKindSchema = z.enum(['native', 'token']);

/**
 * Base-unit amount as a string of digits, e.g. "2500000000000000000"
 */
export const AmountStringSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Amount must be a non-negative integer string of base units');

/**
 * Amount string parsed into a bigint (zero is passed through; the ledger rejects it)
 */
export const AmountSchema = AmountStringSchema.transform((value) => BigInt(value));

/**
 * Account identifier: 1-128 characters, no whitespace
 */
export const AccountIdSchema = z
  .string()
  .min(1, 'Account is required')
  .max(128, 'Account must be 128 characters or less')
  .regex(/^\S+$/, 'Account must not contain whitespace');

/**
 * Request schema for deposits and withdrawals
 * - asset: "native" or "token"
 * - amount: base units as a string
 */
export const LedgerOperationRequestSchema = z.object({
  asset: AssetKindSchema,
  amount: AmountSchema,
});

export const QuoteQuerySchema = z.object({
  amount: AmountSchema,
});

export const BalancesResponseSchema = z.object({
  account: z.string(),
  native: AmountStringSchema,
  token: AmountStringSchema,
});

export const QuoteResponseSchema = z.object({
  amount: AmountStringSchema,
  referenceValue: AmountStringSchema,
});

export const LedgerSummaryResponseSchema = z.object({
  totalNative: AmountStringSchema,
  depositCap: AmountStringSchema,
  totalReferenceValue: AmountStringSchema,
  remainingCapacity: AmountStringSchema,
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
});

export const HealthResponseSchema = z.object({
  status: z.literal('ok'),
  timestamp: z.string(),
  version: z.string(),
});

// Export TypeScript types derived from schemas
export type AssetKind = z.infer<typeof AssetKindSchema>;
export type LedgerOperationRequest = z.input<typeof LedgerOperationRequestSchema>;
export type BalancesResponse = z.infer<typeof BalancesResponseSchema>;
export type QuoteResponse = z.infer<typeof QuoteResponseSchema>;
export type LedgerSummaryResponse = z.infer<typeof LedgerSummaryResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
