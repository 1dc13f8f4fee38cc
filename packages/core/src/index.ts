/**
 * @repo/core - Domain logic for the custody ledger
 *
 * Balance accounting, deposit-cap enforcement and reentrancy-safe withdrawals.
 * Consumed by the API layer; no HTTP concerns live here.
 */

export * from './ledger/index.js';
