/**
 * Per-account ledger routes
 *
 * GET  /v1/ledger/accounts/:account/balances
 * POST /v1/ledger/accounts/:account/deposits    { asset, amount } -> 201
 * POST /v1/ledger/accounts/:account/withdrawals { asset, amount } -> 200
 */

import { Hono } from 'hono';
import type { AccountBalances } from '@repo/core';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { AccountIdSchema, LedgerOperationRequestSchema } from '@repo/types';
import { logger } from '@repo/observability';
import { ledgerErrorResponse, validationHook } from '../../../lib/ledger-http-errors.js';
import type { AppBindings } from '../../../types/context.js';
import { toBalancesResponse } from './serialize.js';

const AccountParamSchema = z.object({ account: AccountIdSchema });

const accountsRoute = new Hono<AppBindings>();

accountsRoute.get(
  '/:account/balances',
  zValidator('param', AccountParamSchema, validationHook),
  (c) => {
    const { account } = c.req.valid('param');
    return c.json(toBalancesResponse(account, c.get('ledger').getBalances(account)));
  }
);

accountsRoute.post(
  '/:account/deposits',
  zValidator('param', AccountParamSchema, validationHook),
  zValidator('json', LedgerOperationRequestSchema, validationHook),
  async (c) => {
    const { account } = c.req.valid('param');
    const { asset, amount } = c.req.valid('json');
    const ledger = c.get('ledger');
    const requestId = c.get('requestId');

    try {
      let balances: AccountBalances;
      if (asset === 'native') {
        balances = await ledger.depositNative(account, amount);
        // Attached value moves into custody once the ledger has accepted it
        c.get('nativeInbox')?.receive(amount);
      } else {
        balances = await ledger.depositToken(account, amount);
      }

      return c.json(toBalancesResponse(account, balances), 201);
    } catch (error) {
      const response = ledgerErrorResponse(c, error);
      if (response) {
        logger.info({ requestId, account, asset, amount, err: error }, 'Deposit rejected');
        return response;
      }
      throw error;
    }
  }
);

accountsRoute.post(
  '/:account/withdrawals',
  zValidator('param', AccountParamSchema, validationHook),
  zValidator('json', LedgerOperationRequestSchema, validationHook),
  async (c) => {
    const { account } = c.req.valid('param');
    const { asset, amount } = c.req.valid('json');
    const ledger = c.get('ledger');
    const requestId = c.get('requestId');

    try {
      const balances =
        asset === 'native'
          ? await ledger.withdrawNative(account, amount)
          : await ledger.withdrawToken(account, amount);

      return c.json(toBalancesResponse(account, balances), 200);
    } catch (error) {
      const response = ledgerErrorResponse(c, error);
      if (response) {
        logger.info({ requestId, account, asset, amount, err: error }, 'Withdrawal rejected');
        return response;
      }
      throw error;
    }
  }
);

export { accountsRoute };
