/**
 * POST /v1/entries - Insert receipts
 *
 * Body is a JSON array of raw receipts. Each item is validated on its own:
 * valid items are stored, invalid ones come back in `rejected` with their index.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { CreateReceiptsRequestSchema } from '@kakeibo/types';
import { validationHook } from '../../../middleware/validation.js';
import type { AppBindings } from '../../../types/context.js';
import { respondWithCreated } from './respond.js';

const createEntriesRoute = new Hono<AppBindings>();

createEntriesRoute.post('/', zValidator('json', CreateReceiptsRequestSchema, validationHook), async (c) => {
  const raws = c.req.valid('json');

  const result = await c.get('ledgerService').createReceipts(raws);

  return respondWithCreated(c, result);
});

export { createEntriesRoute };
