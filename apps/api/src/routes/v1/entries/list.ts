/**
 * GET /v1/entries - List receipts
 *
 * Optional filters: date_from, date_to (inclusive YYYY-MM-DD) and category (exact).
 * Returns the matching receipts in insertion order with their totals.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ReceiptFilterQuerySchema } from '@kakeibo/types';
import { toFilterCriteria } from '../../../lib/filter-criteria.js';
import { validationHook } from '../../../middleware/validation.js';
import type { AppBindings } from '../../../types/context.js';

const listEntriesRoute = new Hono<AppBindings>();

listEntriesRoute.get('/', zValidator('query', ReceiptFilterQuerySchema, validationHook), async (c) => {
  const criteria = toFilterCriteria(c.req.valid('query'));

  const { totals, receipts } = await c.get('ledgerService').listReceipts(criteria);

  return c.json({
    total: totals.count,
    totalAmount: totals.totalAmount,
    categories: totals.categories,
    entries: receipts,
  });
});

export { listEntriesRoute };
