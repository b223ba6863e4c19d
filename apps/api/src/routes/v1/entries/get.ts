/**
 * GET /v1/entries/:id - Look up one receipt
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ReceiptNotFoundError } from '@kakeibo/core';
import { ReceiptIdParamSchema } from '@kakeibo/types';
import { validationHook } from '../../../middleware/validation.js';
import type { AppBindings } from '../../../types/context.js';

const getEntryRoute = new Hono<AppBindings>();

getEntryRoute.get('/:id', zValidator('param', ReceiptIdParamSchema, validationHook), async (c) => {
  const { id } = c.req.valid('param');

  try {
    const receipt = await c.get('ledgerService').getReceipt(id);
    return c.json(receipt);
  } catch (error) {
    if (error instanceof ReceiptNotFoundError) {
      return c.json({ error: error.message }, 404);
    }
    throw error;
  }
});

export { getEntryRoute };
