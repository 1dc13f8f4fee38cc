import { Hono } from 'hono';
import type { HealthResponse } from '@repo/types';

const healthRoute = new Hono();

healthRoute.get('/', (c) => {
  const response: HealthResponse = {
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version ?? '0.1.0',
  };

  return c.json(response);
});

export { healthRoute };
