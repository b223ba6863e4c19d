/**
 * POST /v1/entries/upload - Insert receipts from a CSV file
 *
 * Expects multipart/form-data with the document in the `file` field.
 * The header row names the columns (date, category, description, amount).
 */

import { Hono } from 'hono';
import { MalformedTabularError } from '@kakeibo/core';
import type { AppBindings } from '../../../types/context.js';
import { respondWithCreated } from './respond.js';

const uploadEntriesRoute = new Hono<AppBindings>();

uploadEntriesRoute.post('/upload', async (c) => {
  const body = await c.req.parseBody();
  const file = body['file'];

  if (!file || typeof file === 'string' || Array.isArray(file)) {
    return c.json({ error: 'A CSV file is required in the "file" field' }, 400);
  }

  try {
    const result = await c.get('ledgerService').importTabular(await file.text());
    return respondWithCreated(c, result);
  } catch (error) {
    if (error instanceof MalformedTabularError) {
      return c.json({ error: error.message }, 400);
    }
    throw error;
  }
});

export { uploadEntriesRoute };
