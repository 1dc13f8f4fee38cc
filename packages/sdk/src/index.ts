/**
 * @repo/sdk - Typed client for the ledger HTTP API
 *
 * Amounts are bigint on this side and decimal strings on the wire.
 * Every response is validated against the shared @repo/types schemas.
 */

import type { z } from 'zod';
import {
  BalancesResponseSchema,
  ErrorResponseSchema,
  HealthResponseSchema,
  LedgerSummaryResponseSchema,
  QuoteResponseSchema,
  type AssetKind,
  type HealthResponse,
} from '@repo/types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SDKConfig {
  baseUrl: string;
  fetch?: FetchLike;
  headers?: Record<string, string>;
}

export interface Balances {
  account: string;
  native: bigint;
  token: bigint;
}

export interface Summary {
  totalNative: bigint;
  depositCap: bigint;
  totalReferenceValue: bigint;
  remainingCapacity: bigint;
}

export class LedgerApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string
  ) {
    super(message);
    this.name = 'LedgerApiError';
  }
}

export class LedgerClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchLike;

  constructor(private config: SDKConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async health(): Promise<HealthResponse> {
    return this.request('GET', '/health', HealthResponseSchema);
  }

  async getSummary(): Promise<Summary> {
    const body = await this.request('GET', '/v1/ledger/summary', LedgerSummaryResponseSchema);
    return {
      totalNative: BigInt(body.totalNative),
      depositCap: BigInt(body.depositCap),
      totalReferenceValue: BigInt(body.totalReferenceValue),
      remainingCapacity: BigInt(body.remainingCapacity),
    };
  }

  /**
   * Reference-currency value of `amount` native base units
   */
  async quote(amount: bigint): Promise<bigint> {
    const body = await this.request(
      'GET',
      `/v1/ledger/quote?amount=${amount.toString()}`,
      QuoteResponseSchema
    );
    return BigInt(body.referenceValue);
  }

  async getBalances(account: string): Promise<Balances> {
    const body = await this.request(
      'GET',
      `${accountPath(account)}/balances`,
      BalancesResponseSchema
    );
    return toBalances(body);
  }

  async deposit(account: string, asset: AssetKind, amount: bigint): Promise<Balances> {
    const body = await this.request(
      'POST',
      `${accountPath(account)}/deposits`,
      BalancesResponseSchema,
      { asset, amount: amount.toString() }
    );
    return toBalances(body);
  }

  async withdraw(account: string, asset: AssetKind, amount: bigint): Promise<Balances> {
    const body = await this.request(
      'POST',
      `${accountPath(account)}/withdrawals`,
      BalancesResponseSchema,
      { asset, amount: amount.toString() }
    );
    return toBalances(body);
  }

  private async request<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    body?: unknown
  ): Promise<z.output<S>> {
    const response = await this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers: {
        'Content-Type': 'application/json',
        ...this.config.headers,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const payload: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const parsed = ErrorResponseSchema.safeParse(payload);
      if (parsed.success) {
        throw new LedgerApiError(parsed.data.error, response.status, parsed.data.code);
      }
      throw new LedgerApiError(`Request failed with status ${response.status}`, response.status);
    }

    return schema.parse(payload);
  }
}

function accountPath(account: string) {
  return `/v1/ledger/accounts/${encodeURIComponent(account)}`;
}

function toBalances(body: z.output<typeof BalancesResponseSchema>): Balances {
  return {
    account: body.account,
    native: BigInt(body.native),
    token: BigInt(body.token),
  };
}

export default LedgerClient;
