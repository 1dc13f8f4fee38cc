import type { LedgerService } from '@repo/core';

/**
 * Anything that can take custody of native value attached to a deposit
 */
export interface NativeInbox {
  receive(amount: bigint): void;
}

/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
  ledger: LedgerService;
  nativeInbox: NativeInbox | null;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
