/**
 * Price oracle adapter tests
 *
 * The Chainlink adapter runs against an in-process viem transport that
 * answers eth_call with encoded decimals() and latestRoundData() results.
 */

import { describe, it, expect } from 'vitest';
import { custom, decodeFunctionData, encodeFunctionResult, isHex, type Hex } from 'viem';
import {
  AGGREGATOR_V3_ABI,
  ChainlinkPriceOracle,
  FixedPriceOracle,
  OracleReadError,
} from '../price-oracles.js';

const FEED = '0x5f4eC3Df9cbd43714FE2740f5E3616155c5b8419';

function callData(params: unknown): Hex {
  const call: unknown = Array.isArray(params) ? params[0] : undefined;
  if (call && typeof call === 'object' && 'data' in call && isHex(call.data)) {
    return call.data;
  }
  throw new Error('eth_call without data');
}

function feedTransport(answer: bigint, methods: string[] = [], feedDecimals = 8) {
  return custom({
    async request({ method, params }) {
      methods.push(method);
      if (method !== 'eth_call') {
        throw new Error(`Unexpected RPC method ${method}`);
      }

      const { functionName } = decodeFunctionData({
        abi: AGGREGATOR_V3_ABI,
        data: callData(params),
      });
      if (functionName === 'decimals') {
        return encodeFunctionResult({
          abi: AGGREGATOR_V3_ABI,
          functionName: 'decimals',
          result: feedDecimals,
        });
      }
      return encodeFunctionResult({
        abi: AGGREGATOR_V3_ABI,
        functionName: 'latestRoundData',
        result: [110n, answer, 1700000000n, 1700000000n, 110n],
      });
    },
  });
}

describe('FixedPriceOracle', () => {
  it('should return the configured rate and decimals', async () => {
    const oracle = new FixedPriceOracle(3934n * 10n ** 8n);

    expect(oracle.decimals).toBe(8);
    expect(await oracle.readRate()).toBe(393400000000n);
  });

  it('should follow rate updates', async () => {
    const oracle = new FixedPriceOracle(1n, 2);
    oracle.setRate(250n);

    expect(await oracle.readRate()).toBe(250n);
  });

  it('should reject while a failure is set and recover afterwards', async () => {
    const oracle = new FixedPriceOracle(100n);
    oracle.failWith(new Error('stale round'));

    await expect(oracle.readRate()).rejects.toThrow('stale round');

    oracle.failWith(null);
    await expect(oracle.readRate()).resolves.toBe(100n);
  });
});

describe('ChainlinkPriceOracle', () => {
  it('should return the latest answer from the feed', async () => {
    const methods: string[] = [];
    const oracle = new ChainlinkPriceOracle({
      feedAddress: FEED,
      transport: feedTransport(3934n * 10n ** 8n, methods),
    });

    expect(await oracle.readRate()).toBe(393400000000n);
    expect(oracle.decimals).toBe(8);
    expect(methods).toEqual(['eth_call']);
  });

  it('should honour a custom decimals setting', () => {
    const oracle = new ChainlinkPriceOracle({
      feedAddress: FEED,
      decimals: 18,
      transport: feedTransport(1n),
    });

    expect(oracle.decimals).toBe(18);
  });

  it('should throw OracleReadError on a non-positive answer', async () => {
    const oracle = new ChainlinkPriceOracle({
      feedAddress: FEED,
      transport: feedTransport(0n),
    });

    await expect(oracle.readRate()).rejects.toThrow(OracleReadError);
    await expect(oracle.readRate()).rejects.toThrow(
      `Price feed ${FEED} returned non-positive answer 0`
    );
  });

  it('should wrap RPC failures in OracleReadError', async () => {
    const oracle = new ChainlinkPriceOracle({
      feedAddress: FEED,
      transport: custom(
        {
          async request() {
            throw new Error('connection refused');
          },
        },
        { retryCount: 0 }
      ),
    });

    const error = await oracle.readRate().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(OracleReadError);
    expect(error).toMatchObject({ message: `Price feed ${FEED} could not be read` });
  });

  describe('verifyDecimals', () => {
    it('should accept matching decimals', async () => {
      const oracle = new ChainlinkPriceOracle({
        feedAddress: FEED,
        decimals: 8,
        transport: feedTransport(1n, [], 8),
      });

      await expect(oracle.verifyDecimals()).resolves.toBeUndefined();
    });

    it('should refuse decimals that differ from the feed', async () => {
      const oracle = new ChainlinkPriceOracle({
        feedAddress: FEED,
        decimals: 18,
        transport: feedTransport(1n, [], 8),
      });

      const error = await oracle.verifyDecimals().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(OracleReadError);
      expect(error).toMatchObject({
        message: `Price feed ${FEED} reports 8 decimals, configured 18`,
      });
    });
  });
});
