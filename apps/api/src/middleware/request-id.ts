import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';
import type { AppBindings } from '../types/context.js';

/**
 * Request ID middleware
 * Reuses an upstream x-request-id / x-correlation-id or generates one,
 * exposes it as c.var.requestId and echoes it on the response
 */
export async function requestIdMiddleware(c: Context<AppBindings>, next: Next) {
  const requestId =
    c.req.header('x-request-id') || c.req.header('x-correlation-id') || randomUUID();

  c.set('requestId', requestId);
  c.header('x-request-id', requestId);

  await next();
}
