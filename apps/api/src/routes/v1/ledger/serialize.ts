import type { AccountBalances, LedgerSummary } from '@repo/core';
import type { BalancesResponse, LedgerSummaryResponse } from '@repo/types';

export function toBalancesResponse(account: string, balances: AccountBalances): BalancesResponse {
  return {
    account,
    native: balances.native.toString(),
    token: balances.token.toString(),
  };
}

export function toSummaryResponse(summary: LedgerSummary): LedgerSummaryResponse {
  return {
    totalNative: summary.totalNative.toString(),
    depositCap: summary.depositCap.toString(),
    totalReferenceValue: summary.totalReferenceValue.toString(),
    remainingCapacity: summary.remainingCapacity.toString(),
  };
}
