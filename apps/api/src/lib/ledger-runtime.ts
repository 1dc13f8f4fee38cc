/**
 * Wires the ledger service to its collaborators from configuration.
 *
 * The token and native transfer sides run in-process; configured token grants
 * are minted and approved for custody so token deposits can settle. The price
 * feed is either a fixed rate or a Chainlink aggregator read over JSON-RPC.
 */

import {
  ChainlinkPriceOracle,
  FixedPriceOracle,
  InMemoryNativeTransfer,
  InMemoryTokenContract,
  LedgerRepository,
  LedgerService,
  type LedgerEvents,
  type PriceOracle,
} from '@repo/core';
import type { Logger } from '@repo/observability';
import type { LedgerConfig, PriceFeedConfig } from './ledger-config.js';

export interface LedgerRuntime {
  ledger: LedgerService;
  oracle: PriceOracle;
  token: InMemoryTokenContract;
  nativeTransfer: InMemoryNativeTransfer;
}

export function createPriceOracle(feed: PriceFeedConfig): PriceOracle {
  switch (feed.mode) {
    case 'fixed':
      return new FixedPriceOracle(feed.rate, feed.decimals);
    case 'chainlink':
      return new ChainlinkPriceOracle({
        feedAddress: feed.feedAddress,
        rpcUrl: feed.rpcUrl,
        decimals: feed.decimals,
      });
  }
}

export function createLedgerRuntime(
  config: LedgerConfig,
  options: { events?: LedgerEvents; logger?: Logger } = {}
): LedgerRuntime {
  const oracle = createPriceOracle(config.priceFeed);
  const token = new InMemoryTokenContract(config.custodyAccount);
  const nativeTransfer = new InMemoryNativeTransfer(config.custodyAccount);

  const ledger = new LedgerService({
    oracle,
    token,
    nativeTransfer,
    depositCap: config.depositCap,
    custodyAccount: config.custodyAccount,
    repository: new LedgerRepository(),
    events: options.events,
    logger: options.logger,
  });

  for (const grant of config.tokenGrants) {
    token.mint(grant.account, grant.amount);
    token.approve(grant.account, config.custodyAccount, grant.amount);
  }

  return { ledger, oracle, token, nativeTransfer };
}

/**
 * Startup check for feeds that can describe themselves
 */
export async function verifyPriceOracle(oracle: PriceOracle): Promise<void> {
  if (oracle instanceof ChainlinkPriceOracle) {
    await oracle.verifyDecimals();
  }
}
