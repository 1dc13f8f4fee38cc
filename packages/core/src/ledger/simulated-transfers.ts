/**
 * In-process stand-ins for the token contract and native value transfers.
 * Used by the local API server and by tests; no network involved.
 */

import type { NativeSendResult, NativeTransfer, TokenTransfer } from './ledger-types.js';

/**
 * ERC-20-like token with balances and allowances.
 * `pull` spends the `from → to` allowance; `push` pays out of the custody account.
 */
export class InMemoryTokenContract implements TokenTransfer {
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();

  constructor(private readonly custodyAccount: string) {}

  mint(account: string, amount: bigint) {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  approve(owner: string, spender: string, amount: bigint) {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  async pull(from: string, to: string, amount: bigint): Promise<boolean> {
    const allowed = this.allowance(from, to);
    if (allowed < amount || this.balanceOf(from) < amount) {
      return false;
    }

    this.allowances.set(allowanceKey(from, to), allowed - amount);
    this.move(from, to, amount);
    return true;
  }

  async push(to: string, amount: bigint): Promise<boolean> {
    if (this.balanceOf(this.custodyAccount) < amount) {
      return false;
    }

    this.move(this.custodyAccount, to, amount);
    return true;
  }

  private move(from: string, to: string, amount: bigint) {
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }
}

function allowanceKey(owner: string, spender: string) {
  return `${owner}→${spender}`;
}

/**
 * Runs after funds reach the recipient, before the send resolves.
 * Returning a NativeSendResult with `ok: false` fails the send and reverts it.
 */
export type RecipientHook = (amount: bigint) => Promise<NativeSendResult | void>;

export class InMemoryNativeTransfer implements NativeTransfer {
  private readonly holdings = new Map<string, bigint>();
  private readonly hooks = new Map<string, RecipientHook>();

  constructor(private readonly custodyAccount: string) {}

  /**
   * Value attached to a native deposit lands in custody
   */
  receive(amount: bigint) {
    this.holdings.set(this.custodyAccount, this.holdingsOf(this.custodyAccount) + amount);
  }

  holdingsOf(account: string): bigint {
    return this.holdings.get(account) ?? 0n;
  }

  setRecipientHook(account: string, hook: RecipientHook | null) {
    if (hook) {
      this.hooks.set(account, hook);
    } else {
      this.hooks.delete(account);
    }
  }

  async send(to: string, amount: bigint): Promise<NativeSendResult> {
    if (this.holdingsOf(this.custodyAccount) < amount) {
      return { ok: false, payload: 'insufficient custody holdings' };
    }

    this.move(this.custodyAccount, to, amount);

    const hook = this.hooks.get(to);
    if (!hook) {
      return { ok: true };
    }

    let outcome: NativeSendResult | void;
    try {
      outcome = await hook(amount);
    } catch (error) {
      outcome = { ok: false, payload: error };
    }

    if (outcome && !outcome.ok) {
      this.move(to, this.custodyAccount, amount);
      return outcome;
    }
    return { ok: true };
  }

  private move(from: string, to: string, amount: bigint) {
    this.holdings.set(from, this.holdingsOf(from) - amount);
    this.holdings.set(to, this.holdingsOf(to) + amount);
  }
}
