/**
 * GET /v1/ledger/quote?amount= - Reference value of a native amount at the current rate
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { QuoteQuerySchema } from '@repo/types';
import { validationHook } from '../../../lib/ledger-http-errors.js';
import type { AppBindings } from '../../../types/context.js';

const quoteRoute = new Hono<AppBindings>();

quoteRoute.get('/quote', zValidator('query', QuoteQuerySchema, validationHook), async (c) => {
  const { amount } = c.req.valid('query');
  const referenceValue = await c.get('ledger').convertNativeToReference(amount);

  return c.json({
    amount: amount.toString(),
    referenceValue: referenceValue.toString(),
  });
});

export { quoteRoute };
