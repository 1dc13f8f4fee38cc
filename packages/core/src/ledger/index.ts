/**
 * Ledger Domain
 *
 * Public exports for custodial balance management
 */

// Repository layer
export { LedgerRepository, LedgerUnitOfWork } from './ledger-repository.js';

// Service layer
export { LedgerService } from './ledger-service.js';
export type { LedgerServiceOptions } from './ledger-service.js';
export { ReentrancyGuard } from './reentrancy-guard.js';

// Events
export { LedgerEventEmitter, ledgerEvents } from './ledger-events.js';
export type {
  LedgerEvent,
  LedgerEventHandler,
  LedgerEventType,
  LedgerEvents,
} from './ledger-events.js';

// Adapters
export {
  AGGREGATOR_V3_ABI,
  ChainlinkPriceOracle,
  FixedPriceOracle,
  OracleReadError,
} from './price-oracles.js';
export type { ChainlinkPriceOracleOptions } from './price-oracles.js';
export { InMemoryNativeTransfer, InMemoryTokenContract } from './simulated-transfers.js';
export type { RecipientHook } from './simulated-transfers.js';

// Units
export {
  NATIVE_DECIMALS,
  NATIVE_UNIT,
  convertNativeToReference,
  formatUnits,
  parseUnits,
  scaleReferenceUnits,
} from './units.js';

// Domain types
export { ASSET_KINDS } from './ledger-types.js';
export type {
  AccountBalances,
  AssetKind,
  LedgerSummary,
  NativeSendResult,
  NativeTransfer,
  PriceOracle,
  TokenTransfer,
} from './ledger-types.js';

// Domain errors
export {
  LedgerError,
  InvalidAmountError,
  InsufficientBalanceError,
  CapExceededError,
  TransferFailedError,
  ReentrantCallError,
  InvalidAddressError,
  isLedgerError,
} from './ledger-errors.js';
export type { LedgerErrorCode } from './ledger-errors.js';
