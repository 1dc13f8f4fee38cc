/**
 * Ledger Repository
 *
 * In-memory account store keyed by account id.
 * Missing records read as zero balances; records are never deleted.
 */

import { InsufficientBalanceError } from './ledger-errors.js';
import type { AccountBalances, AssetKind } from './ledger-types.js';

interface Adjustment {
  account: string;
  asset: AssetKind;
  amount: bigint;
}

/**
 * Unit of work handed to `LedgerRepository.transaction()`.
 *
 * Debits are applied to the store immediately (state is updated before any
 * external call the action makes) and compensated if the action fails.
 * Credits are staged and only become visible once the action succeeds.
 */
export class LedgerUnitOfWork {
  private readonly applied: Adjustment[] = [];
  private readonly staged: Adjustment[] = [];

  constructor(private readonly repo: LedgerRepository) {}

  debit(account: string, asset: AssetKind, amount: bigint): void {
    this.repo.debit(account, asset, amount);
    this.applied.push({ account, asset, amount });
    if (asset === 'native') {
      this.repo.adjustInFlightNative(amount);
    }
  }

  credit(account: string, asset: AssetKind, amount: bigint): void {
    this.staged.push({ account, asset, amount });
  }

  /** @internal */
  commit(): void {
    for (const { account, asset, amount } of this.staged) {
      this.repo.credit(account, asset, amount);
    }
    this.settleInFlight();
    this.staged.length = 0;
    this.applied.length = 0;
  }

  /** @internal */
  rollback(): void {
    // Deltas commute, so restoring debits stays correct even if other
    // operations touched the same accounts in the meantime
    for (const { account, asset, amount } of this.applied.reverse()) {
      this.repo.credit(account, asset, amount);
    }
    this.settleInFlight();
    this.staged.length = 0;
    this.applied.length = 0;
  }

  private settleInFlight(): void {
    for (const { asset, amount } of this.applied) {
      if (asset === 'native') {
        this.repo.adjustInFlightNative(-amount);
      }
    }
  }
}

export class LedgerRepository {
  private readonly accounts = new Map<string, AccountBalances>();
  private totalNative = 0n;
  private inFlightNative = 0n;

  /**
   * Balances for an account; zeros when it has never been credited
   */
  findBalances(account: string): AccountBalances {
    const record = this.accounts.get(account);
    return record ? { ...record } : { native: 0n, token: 0n };
  }

  getTotalNative(): bigint {
    return this.totalNative;
  }

  /**
   * Native debited by transactions that have not settled yet.
   * A rollback puts it back into the total, so cap checks must count it.
   */
  getInFlightNative(): bigint {
    return this.inFlightNative;
  }

  /** @internal */
  adjustInFlightNative(delta: bigint): void {
    this.inFlightNative += delta;
  }

  /**
   * Recomputed sum of every account's native balance
   */
  sumNative(): bigint {
    let sum = 0n;
    for (const record of this.accounts.values()) {
      sum += record.native;
    }
    return sum;
  }

  credit(account: string, asset: AssetKind, amount: bigint): AccountBalances {
    const record = this.getOrCreate(account);
    record[asset] += amount;
    if (asset === 'native') {
      this.totalNative += amount;
    }
    return { ...record };
  }

  debit(account: string, asset: AssetKind, amount: bigint): AccountBalances {
    const record = this.accounts.get(account);
    if (!record || amount > record[asset]) {
      throw new InsufficientBalanceError(account, amount, record ? record[asset] : 0n);
    }

    record[asset] -= amount;
    if (asset === 'native') {
      this.totalNative -= amount;
    }
    return { ...record };
  }

  /**
   * Run `action` as one atomic unit: staged credits commit when it resolves,
   * applied debits are restored when it rejects (the error is rethrown)
   */
  async transaction<T>(action: (tx: LedgerUnitOfWork) => Promise<T>): Promise<T> {
    const tx = new LedgerUnitOfWork(this);
    let result: T;
    try {
      result = await action(tx);
    } catch (error) {
      tx.rollback();
      throw error;
    }
    tx.commit();
    return result;
  }

  private getOrCreate(account: string): AccountBalances {
    let record = this.accounts.get(account);
    if (!record) {
      record = { native: 0n, token: 0n };
      this.accounts.set(account, record);
    }
    return record;
  }
}
