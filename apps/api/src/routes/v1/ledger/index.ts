/**
 * Ledger routes
 * Balances, deposits, withdrawals and the cap summary
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { accountsRoute } from './accounts.js';
import { quoteRoute } from './quote.js';
import { summaryRoute } from './summary.js';

const ledgerRoute = new Hono<AppBindings>();

ledgerRoute.route('/', summaryRoute);
ledgerRoute.route('/', quoteRoute);
ledgerRoute.route('/accounts', accountsRoute);

export { ledgerRoute };
