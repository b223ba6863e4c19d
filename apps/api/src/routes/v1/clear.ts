/**
 * POST /v1/clear?confirm=true - Remove every receipt
 *
 * Without an explicit confirm=true nothing is removed and 409 is returned.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ConfirmationRequiredError } from '@kakeibo/core';
import { ClearQuerySchema } from '@kakeibo/types';
import { validationHook } from '../../middleware/validation.js';
import type { AppBindings } from '../../types/context.js';

const clearRoute = new Hono<AppBindings>();

clearRoute.post('/', zValidator('query', ClearQuerySchema, validationHook), async (c) => {
  const { confirm } = c.req.valid('query');

  try {
    const cleared = await c.get('ledgerService').clearAll(confirm);

    return c.json({ cleared });
  } catch (error) {
    if (error instanceof ConfirmationRequiredError) {
      return c.json({ error: error.message, code: error.code }, 409);
    }
    throw error;
  }
});

export { clearRoute };
