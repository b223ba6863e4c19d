/**
 * GET /v1/export - Download receipts as CSV
 *
 * Accepts the same filters as GET /v1/entries.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ReceiptFilterQuerySchema } from '@kakeibo/types';
import { toFilterCriteria } from '../../lib/filter-criteria.js';
import { validationHook } from '../../middleware/validation.js';
import type { AppBindings } from '../../types/context.js';

const exportRoute = new Hono<AppBindings>();

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Attachment name stamped with the UTC export time: entries_YYYYMMDDHHMMSS.csv
 */
export function exportFileName(now: Date): string {
  const stamp =
    String(now.getUTCFullYear()) +
    pad(now.getUTCMonth() + 1) +
    pad(now.getUTCDate()) +
    pad(now.getUTCHours()) +
    pad(now.getUTCMinutes()) +
    pad(now.getUTCSeconds());

  return `entries_${stamp}.csv`;
}

exportRoute.get('/', zValidator('query', ReceiptFilterQuerySchema, validationHook), async (c) => {
  const criteria = toFilterCriteria(c.req.valid('query'));

  const document = await c.get('ledgerService').exportReceipts(criteria);

  return c.body(document, 200, {
    'Content-Type': 'text/csv; charset=utf-8',
    'Content-Disposition': `attachment; filename=${exportFileName(new Date())}`,
  });
});

export { exportRoute };
