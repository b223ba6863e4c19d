/**
 * POST /v1/sample - Insert the demo receipts
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../types/context.js';

const sampleRoute = new Hono<AppBindings>();

sampleRoute.post('/', async (c) => {
  const result = await c.get('ledgerService').seedSampleData();

  return c.json(result, 201);
});

export { sampleRoute };
