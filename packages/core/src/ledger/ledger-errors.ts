/**
 * Ledger Domain Errors
 *
 * Custom error classes for ledger business rule violations.
 * Each carries a stable `code` that route handlers map to HTTP status codes.
 */

export type LedgerErrorCode =
  | 'INVALID_AMOUNT'
  | 'INSUFFICIENT_BALANCE'
  | 'CAP_EXCEEDED'
  | 'TRANSFER_FAILED'
  | 'REENTRANT_CALL'
  | 'INVALID_ADDRESS';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LedgerError';
    this.code = code;
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(amount: bigint) {
    super('INVALID_AMOUNT', `Amount must be greater than zero, got ${amount}`);
    this.name = 'InvalidAmountError';
  }
}

export class InsufficientBalanceError extends LedgerError {
  constructor(
    readonly account: string,
    readonly requested: bigint,
    readonly available: bigint
  ) {
    super(
      'INSUFFICIENT_BALANCE',
      `Insufficient balance for ${account}: requested ${requested}, available ${available}`
    );
    this.name = 'InsufficientBalanceError';
  }
}

export class CapExceededError extends LedgerError {
  constructor(
    readonly projectedValue: bigint,
    readonly cap: bigint
  ) {
    super('CAP_EXCEEDED', `Deposit cap exceeded: projected value ${projectedValue} > cap ${cap}`);
    this.name = 'CapExceededError';
  }
}

export class TransferFailedError extends LedgerError {
  /** Raw failure detail reported by the transfer callee */
  readonly payload: unknown;

  constructor(message: string, payload?: unknown) {
    super('TRANSFER_FAILED', message);
    this.name = 'TransferFailedError';
    this.payload = payload;
  }
}

export class ReentrantCallError extends LedgerError {
  constructor() {
    super('REENTRANT_CALL', 'Reentrant call rejected: a withdrawal is already in progress');
    this.name = 'ReentrantCallError';
  }
}

export class InvalidAddressError extends LedgerError {
  constructor(field: string) {
    super('INVALID_ADDRESS', `Invalid address: ${field} must be set`);
    this.name = 'InvalidAddressError';
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
