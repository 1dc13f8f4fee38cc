/**
 * GET /v1/ledger/summary - Pooled native total against the deposit cap
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { toSummaryResponse } from './serialize.js';

const summaryRoute = new Hono<AppBindings>();

summaryRoute.get('/summary', async (c) => {
  const summary = await c.get('ledger').getSummary();
  return c.json(toSummaryResponse(summary));
});

export { summaryRoute };
