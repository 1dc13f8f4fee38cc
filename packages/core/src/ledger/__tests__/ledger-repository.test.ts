/**
 * Ledger Repository Tests
 *
 * Covers the account store and the unit-of-work commit/rollback rules
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LedgerRepository } from '../ledger-repository.js';
import { InsufficientBalanceError } from '../ledger-errors.js';

describe('LedgerRepository', () => {
  let repo: LedgerRepository;

  beforeEach(() => {
    repo = new LedgerRepository();
  });

  it('should read zero balances for unknown accounts', () => {
    expect(repo.findBalances('ghost')).toEqual({ native: 0n, token: 0n });
  });

  it('should keep the native total equal to the sum of accounts', () => {
    repo.credit('alice', 'native', 70n);
    repo.credit('bob', 'native', 30n);
    repo.credit('bob', 'token', 999n);
    repo.debit('alice', 'native', 20n);

    expect(repo.getTotalNative()).toBe(80n);
    expect(repo.sumNative()).toBe(80n);
  });

  it('should return copies rather than live records', () => {
    repo.credit('alice', 'token', 5n);
    const snapshot = repo.findBalances('alice');
    snapshot.token = 100n;

    expect(repo.findBalances('alice').token).toBe(5n);
  });

  it('should refuse a debit past the balance', () => {
    repo.credit('alice', 'token', 5n);

    expect(() => repo.debit('alice', 'token', 6n)).toThrow(InsufficientBalanceError);
    expect(() => repo.debit('ghost', 'native', 1n)).toThrow(
      'Insufficient balance for ghost: requested 1, available 0'
    );
    expect(repo.findBalances('alice').token).toBe(5n);
  });

  describe('transaction', () => {
    it('should commit staged credits when the action resolves', async () => {
      const result = await repo.transaction(async (tx) => {
        tx.credit('alice', 'token', 10n);
        expect(repo.findBalances('alice').token).toBe(0n);
        return 'done';
      });

      expect(result).toBe('done');
      expect(repo.findBalances('alice').token).toBe(10n);
    });

    it('should apply debits immediately', async () => {
      repo.credit('alice', 'native', 10n);

      await repo.transaction(async (tx) => {
        tx.debit('alice', 'native', 4n);
        expect(repo.findBalances('alice').native).toBe(6n);
        expect(repo.getTotalNative()).toBe(6n);
      });

      expect(repo.findBalances('alice').native).toBe(6n);
    });

    it('should restore debits and drop staged credits when the action rejects', async () => {
      repo.credit('alice', 'native', 10n);
      const failure = new Error('boom');

      await expect(
        repo.transaction(async (tx) => {
          tx.debit('alice', 'native', 4n);
          tx.credit('bob', 'token', 7n);
          throw failure;
        })
      ).rejects.toBe(failure);

      expect(repo.findBalances('alice')).toEqual({ native: 10n, token: 0n });
      expect(repo.findBalances('bob')).toEqual({ native: 0n, token: 0n });
      expect(repo.getTotalNative()).toBe(10n);
    });

    it('should preserve concurrent credits when rolling back', async () => {
      repo.credit('alice', 'native', 10n);

      await expect(
        repo.transaction(async (tx) => {
          tx.debit('alice', 'native', 10n);
          repo.credit('alice', 'native', 3n);
          throw new Error('send failed');
        })
      ).rejects.toThrow('send failed');

      expect(repo.findBalances('alice').native).toBe(13n);
      expect(repo.sumNative()).toBe(repo.getTotalNative());
    });

    it('should hold native debits in flight until the transaction settles', async () => {
      repo.credit('alice', 'native', 10n);
      repo.credit('alice', 'token', 10n);
      const seen: bigint[] = [];

      await repo.transaction(async (tx) => {
        tx.debit('alice', 'native', 4n);
        tx.debit('alice', 'token', 5n);
        seen.push(repo.getInFlightNative());
      });
      await expect(
        repo.transaction(async (tx) => {
          tx.debit('alice', 'native', 6n);
          seen.push(repo.getInFlightNative());
          throw new Error('send failed');
        })
      ).rejects.toThrow('send failed');

      expect(seen).toEqual([4n, 6n]);
      expect(repo.getInFlightNative()).toBe(0n);
      expect(repo.getTotalNative()).toBe(6n);
    });
  });
});
