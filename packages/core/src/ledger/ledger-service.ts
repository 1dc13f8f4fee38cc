/**
 * Ledger Service
 *
 * Business logic layer for custodial balances of the native asset and the token.
 * Enforces amount/balance/cap rules, orchestrates the repository and the
 * external transfer ports, and emits ledger events.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '@repo/observability';
import {
  CapExceededError,
  InsufficientBalanceError,
  InvalidAddressError,
  InvalidAmountError,
  TransferFailedError,
} from './ledger-errors.js';
import type { LedgerEvents } from './ledger-events.js';
import { ledgerEvents } from './ledger-events.js';
import { LedgerRepository } from './ledger-repository.js';
import type {
  AccountBalances,
  AssetKind,
  LedgerSummary,
  NativeTransfer,
  PriceOracle,
  TokenTransfer,
} from './ledger-types.js';
import { ReentrancyGuard } from './reentrancy-guard.js';
import { convertNativeToReference, scaleReferenceUnits } from './units.js';

export interface LedgerServiceOptions {
  oracle: PriceOracle | null | undefined;
  token: TokenTransfer | null | undefined;
  nativeTransfer: NativeTransfer | null | undefined;
  /** Deposit ceiling in whole reference-currency units */
  depositCap: bigint;
  /** The ledger's own account; destination of token pulls */
  custodyAccount: string;
  repository?: LedgerRepository;
  events?: LedgerEvents;
  logger?: Logger;
}

export class LedgerService {
  private readonly oracle: PriceOracle;
  private readonly token: TokenTransfer;
  private readonly nativeTransfer: NativeTransfer;
  private readonly custodyAccount: string;
  private readonly depositCap: bigint;
  private readonly repo: LedgerRepository;
  private readonly events: LedgerEvents;
  private readonly logger: Logger;
  private readonly guard = new ReentrancyGuard();

  /**
   * @throws {InvalidAddressError} If a collaborator or the custody account is missing
   * @throws {InvalidAmountError} If the deposit cap is negative
   */
  constructor(options: LedgerServiceOptions) {
    if (!options.oracle) throw new InvalidAddressError('oracle');
    if (!options.token) throw new InvalidAddressError('token');
    if (!options.nativeTransfer) throw new InvalidAddressError('nativeTransfer');
    if (!options.custodyAccount) throw new InvalidAddressError('custodyAccount');
    if (options.depositCap < 0n) throw new InvalidAmountError(options.depositCap);

    this.oracle = options.oracle;
    this.token = options.token;
    this.nativeTransfer = options.nativeTransfer;
    this.custodyAccount = options.custodyAccount;
    this.depositCap = scaleReferenceUnits(options.depositCap, options.oracle.decimals);
    this.repo = options.repository ?? new LedgerRepository();
    this.events = options.events ?? ledgerEvents;
    this.logger = options.logger ?? rootLogger.child({ module: 'ledger' });
  }

  /**
   * Credit native value attached by the caller
   *
   * Business rules:
   * - Amount must be positive
   * - Reference value of (total native + in-flight withdrawals + amount)
   *   must not exceed the cap
   *
   * @throws {InvalidAmountError} If amount is zero
   * @throws {CapExceededError} If the deposit would push the total past the cap
   */
  async depositNative(account: string, amount: bigint): Promise<AccountBalances> {
    this.assertPositive(amount);

    const rate = await this.oracle.readRate();

    // No await between the cap check and the credit. Native held by a pending
    // withdrawal still counts: a failed send restores it to the total.
    const exposure = this.repo.getTotalNative() + this.repo.getInFlightNative();
    const projected = convertNativeToReference(exposure + amount, rate);
    if (projected > this.depositCap) {
      throw new CapExceededError(projected, this.depositCap);
    }

    const balances = this.repo.credit(account, 'native', amount);

    this.logger.debug({ account, asset: 'native', amount, projected }, 'Native deposit recorded');
    this.events.emit({ type: 'ledger.deposit', account, asset: 'native', amount });

    return balances;
  }

  /**
   * Pull tokens from the caller into custody
   *
   * The credit is staged before the pull and committed only once the pull
   * succeeds; a failed pull leaves no trace in the ledger.
   *
   * @throws {InvalidAmountError} If amount is zero
   * @throws {TransferFailedError} If the token contract reports failure
   */
  async depositToken(account: string, amount: bigint): Promise<AccountBalances> {
    this.assertPositive(amount);

    await this.repo.transaction(async (tx) => {
      tx.credit(account, 'token', amount);

      const ok = await this.token.pull(account, this.custodyAccount, amount);
      if (!ok) {
        throw new TransferFailedError(`Token pull of ${amount} from ${account} failed`, false);
      }
    });

    this.logger.debug({ account, asset: 'token', amount }, 'Token deposit recorded');
    this.events.emit({ type: 'ledger.deposit', account, asset: 'token', amount });

    return this.repo.findBalances(account);
  }

  /**
   * Send native value back to the caller
   *
   * @throws {InvalidAmountError} If amount is zero
   * @throws {InsufficientBalanceError} If amount exceeds the native balance
   * @throws {TransferFailedError} If the send fails (carries the callee payload)
   * @throws {ReentrantCallError} If another withdrawal is in progress
   */
  async withdrawNative(account: string, amount: bigint): Promise<AccountBalances> {
    return this.withdraw(account, 'native', amount, async () => {
      const result = await this.nativeTransfer.send(account, amount);
      if (!result.ok) {
        throw new TransferFailedError(
          `Native transfer of ${amount} to ${account} failed`,
          result.payload
        );
      }
    });
  }

  /**
   * Push tokens back to the caller
   *
   * @throws {InvalidAmountError} If amount is zero
   * @throws {InsufficientBalanceError} If amount exceeds the token balance
   * @throws {TransferFailedError} If the token contract reports failure
   * @throws {ReentrantCallError} If another withdrawal is in progress
   */
  async withdrawToken(account: string, amount: bigint): Promise<AccountBalances> {
    return this.withdraw(account, 'token', amount, async () => {
      const ok = await this.token.push(account, amount);
      if (!ok) {
        throw new TransferFailedError(`Token push of ${amount} to ${account} failed`, false);
      }
    });
  }

  getBalances(account: string): AccountBalances {
    return this.repo.findBalances(account);
  }

  /**
   * Reference-currency value of `amount` native base units at the current rate
   */
  async convertNativeToReference(amount: bigint): Promise<bigint> {
    const rate = await this.oracle.readRate();
    return convertNativeToReference(amount, rate);
  }

  getTotalNative(): bigint {
    return this.repo.getTotalNative();
  }

  /**
   * Deposit cap at the oracle's decimal scale
   */
  getDepositCap(): bigint {
    return this.depositCap;
  }

  async getTotalReferenceValue(): Promise<bigint> {
    return this.convertNativeToReference(this.repo.getTotalNative());
  }

  async getRemainingCapacity(): Promise<bigint> {
    const used = await this.getTotalReferenceValue();
    return used >= this.depositCap ? 0n : this.depositCap - used;
  }

  async getSummary(): Promise<LedgerSummary> {
    const rate = await this.oracle.readRate();
    const totalNative = this.repo.getTotalNative();
    const totalReferenceValue = convertNativeToReference(totalNative, rate);

    return {
      totalNative,
      depositCap: this.depositCap,
      totalReferenceValue,
      remainingCapacity:
        totalReferenceValue >= this.depositCap ? 0n : this.depositCap - totalReferenceValue,
    };
  }

  private async withdraw(
    account: string,
    asset: AssetKind,
    amount: bigint,
    transfer: () => Promise<void>
  ): Promise<AccountBalances> {
    return this.guard.run(async () => {
      this.assertPositive(amount);

      const available = this.repo.findBalances(account)[asset];
      if (amount > available) {
        throw new InsufficientBalanceError(account, amount, available);
      }

      try {
        // Debit is applied before the transfer and restored if it fails
        await this.repo.transaction(async (tx) => {
          tx.debit(account, asset, amount);
          await transfer();
        });
      } catch (error) {
        this.logger.warn({ account, asset, amount, err: error }, 'Withdrawal failed');
        throw error;
      }

      this.logger.debug({ account, asset, amount }, 'Withdrawal completed');
      this.events.emit({ type: 'ledger.withdrawal', account, asset, amount });

      return this.repo.findBalances(account);
    });
  }

  private assertPositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new InvalidAmountError(amount);
    }
  }
}
