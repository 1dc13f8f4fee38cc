/**
 * Price Oracle Adapters
 *
 * FixedPriceOracle: in-process rate source for local runs and tests
 * ChainlinkPriceOracle: AggregatorV3-compatible feed read over JSON-RPC via viem
 */

import { createPublicClient, http, type Address, type Transport } from 'viem';
import type { PriceOracle } from './ledger-types.js';

export class OracleReadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OracleReadError';
  }
}

export class FixedPriceOracle implements PriceOracle {
  private failure: Error | null = null;

  constructor(
    private rate: bigint,
    readonly decimals: number = 8
  ) {}

  setRate(rate: bigint) {
    this.rate = rate;
  }

  /**
   * Make subsequent reads reject with `error` (pass null to recover)
   */
  failWith(error: Error | null) {
    this.failure = error;
  }

  async readRate(): Promise<bigint> {
    if (this.failure) {
      throw this.failure;
    }
    return this.rate;
  }
}

// Minimal AggregatorV3Interface ABI
export const AGGREGATOR_V3_ABI = [
  {
    name: 'decimals',
    type: 'function',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'uint8' }],
  },
  {
    name: 'latestRoundData',
    type: 'function',
    stateMutability: 'view',
    inputs: [],
    outputs: [
      { name: 'roundId', type: 'uint80' },
      { name: 'answer', type: 'int256' },
      { name: 'startedAt', type: 'uint256' },
      { name: 'updatedAt', type: 'uint256' },
      { name: 'answeredInRound', type: 'uint80' },
    ],
  },
] as const;

export interface ChainlinkPriceOracleOptions {
  feedAddress: Address;
  decimals?: number;
  rpcUrl?: string;
  /** Overrides the HTTP transport built from `rpcUrl` */
  transport?: Transport;
}

export class ChainlinkPriceOracle implements PriceOracle {
  readonly decimals: number;
  private readonly feedAddress: Address;
  private readonly readLatestRound: () => Promise<
    readonly [bigint, bigint, bigint, bigint, bigint]
  >;
  private readonly readFeedDecimals: () => Promise<number>;

  constructor(options: ChainlinkPriceOracleOptions) {
    this.decimals = options.decimals ?? 8;
    this.feedAddress = options.feedAddress;

    const client = createPublicClient({
      transport: options.transport ?? http(options.rpcUrl),
    });
    this.readLatestRound = () =>
      client.readContract({
        address: options.feedAddress,
        abi: AGGREGATOR_V3_ABI,
        functionName: 'latestRoundData',
      });
    this.readFeedDecimals = () =>
      client.readContract({
        address: options.feedAddress,
        abi: AGGREGATOR_V3_ABI,
        functionName: 'decimals',
      });
  }

  /**
   * Check the configured decimals against the feed's own `decimals()`.
   * The cap is scaled by them, so a mismatch is refused at startup.
   */
  async verifyDecimals(): Promise<void> {
    let feedDecimals: number;
    try {
      feedDecimals = await this.readFeedDecimals();
    } catch (error) {
      throw new OracleReadError(`Price feed ${this.feedAddress} decimals could not be read`, {
        cause: error,
      });
    }

    if (feedDecimals !== this.decimals) {
      throw new OracleReadError(
        `Price feed ${this.feedAddress} reports ${feedDecimals} decimals, configured ${this.decimals}`
      );
    }
  }

  async readRate(): Promise<bigint> {
    let answer: bigint;
    try {
      [, answer] = await this.readLatestRound();
    } catch (error) {
      throw new OracleReadError(`Price feed ${this.feedAddress} could not be read`, {
        cause: error,
      });
    }

    if (answer <= 0n) {
      throw new OracleReadError(`Price feed ${this.feedAddress} returned non-positive answer ${answer}`);
    }

    return answer;
  }
}
