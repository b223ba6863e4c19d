/**
 * Monthly summary routes
 *
 * GET /v1/summary             - Totals for every month (optionally one via ?year_month)
 * GET /v1/summary/:yearMonth  - One month with categories ranked by amount
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { InvalidYearMonthError } from '@kakeibo/core';
import { SummaryQuerySchema, YearMonthParamSchema } from '@kakeibo/types';
import { validationHook } from '../../middleware/validation.js';
import type { AppBindings } from '../../types/context.js';

const summaryRoute = new Hono<AppBindings>();

summaryRoute.get('/', zValidator('query', SummaryQuerySchema, validationHook), async (c) => {
  const { year_month } = c.req.valid('query');

  try {
    const summary = await c.get('ledgerService').summarizeMonths(year_month);
    return c.json(summary);
  } catch (error) {
    if (error instanceof InvalidYearMonthError) {
      return c.json({ error: error.message }, 400);
    }
    throw error;
  }
});

summaryRoute.get('/:yearMonth', zValidator('param', YearMonthParamSchema, validationHook), async (c) => {
  const { yearMonth } = c.req.valid('param');

  try {
    const breakdown = await c.get('ledgerService').monthlyBreakdown(yearMonth);
    return c.json(breakdown);
  } catch (error) {
    if (error instanceof InvalidYearMonthError) {
      return c.json({ error: error.message }, 400);
    }
    throw error;
  }
});

export { summaryRoute };
