import { serve } from '@hono/node-server';
import { ledgerEvents } from '@repo/core';
import { logger } from '@repo/observability';
import { createApp } from './app.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { loadLedgerConfig } from './lib/ledger-config.js';
import { createLedgerRuntime, verifyPriceOracle } from './lib/ledger-runtime.js';

const config = loadLedgerConfig();
const runtime = createLedgerRuntime(config, { events: ledgerEvents });

// Refuse to start when the feed disagrees with the configured decimals
await verifyPriceOracle(runtime.oracle);

// Initialize audit logging for ledger events
initializeAuditLogging(ledgerEvents, logger);

const app = createApp({ ledger: runtime.ledger, nativeInbox: runtime.nativeTransfer });

logger.info(
  {
    port: config.port,
    depositCap: config.depositCap,
    custodyAccount: config.custodyAccount,
    priceFeed: config.priceFeed.mode,
    tokenGrants: config.tokenGrants.length,
  },
  'Starting server'
);

serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info({ port: config.port }, 'Server running');
