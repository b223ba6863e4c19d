import { Hono } from 'hono';
import type { AppBindings } from '../../types/context.js';

const healthRoute = new Hono<AppBindings>();

healthRoute.get('/', async (c) => {
  const response = {
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    version: c.get('appVersion'),
    receiptCount: await c.get('ledgerService').receiptCount(),
  };

  return c.json(response);
});

export { healthRoute };
