/**
 * Ledger Domain Types
 *
 * Balance records, collaborator ports and service options.
 * These types define the interfaces between layers (HTTP → Service → Repository)
 */

export type AssetKind = 'native' | 'token';

export const ASSET_KINDS: readonly AssetKind[] = ['native', 'token'];

export interface AccountBalances {
  native: bigint;
  token: bigint;
}

/**
 * Exchange rate source for the native asset, quoted in the reference currency.
 * `readRate()` resolves a positive integer scaled by `10^decimals`.
 */
export interface PriceOracle {
  readonly decimals: number;
  readRate(): Promise<bigint>;
}

/**
 * Pull/push transfer interface of the fungible token.
 * Resolving `false` and rejecting are both treated as failure.
 */
export interface TokenTransfer {
  pull(from: string, to: string, amount: bigint): Promise<boolean>;
  push(to: string, amount: bigint): Promise<boolean>;
}

export type NativeSendResult = { ok: true } | { ok: false; payload: unknown };

/**
 * Outbound native value transfer. The recipient may run arbitrary code
 * (including calls back into the ledger) before the send resolves.
 */
export interface NativeTransfer {
  send(to: string, amount: bigint): Promise<NativeSendResult>;
}

export interface LedgerSummary {
  totalNative: bigint;
  depositCap: bigint;
  totalReferenceValue: bigint;
  remainingCapacity: bigint;
}
