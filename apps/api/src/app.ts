import { Hono } from 'hono';
import type { LedgerService } from '@repo/core';
import { logger as rootLogger, type Logger } from '@repo/observability';
import { ledgerErrorResponse } from './lib/ledger-http-errors.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { healthRoute } from './routes/v1/health.js';
import { ledgerRoute } from './routes/v1/ledger/index.js';
import type { AppBindings, NativeInbox } from './types/context.js';

export interface AppOptions {
  ledger: LedgerService;
  /** Receives native value once a native deposit is accepted */
  nativeInbox?: NativeInbox;
  logger?: Logger;
}

export function createApp(options: AppOptions) {
  const logger = options.logger ?? rootLogger;
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    c.set('ledger', options.ledger);
    c.set('nativeInbox', options.nativeInbox ?? null);
    await next();
  });

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();
  v1.route('/health', healthRoute);
  v1.route('/ledger', ledgerRoute);

  app.route('/v1', v1);

  app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404));

  app.onError((error, c) => {
    const known = ledgerErrorResponse(c, error);
    if (known) {
      return known;
    }

    logger.error({ err: error, requestId: c.get('requestId') }, 'Unhandled request error');
    return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
