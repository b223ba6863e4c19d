import type { Context } from 'hono';
import type { CreateReceiptsResult } from '@kakeibo/core';

/**
 * Render a bulk insert result
 * 201 when anything was stored, 422 when every item was rejected
 */
export function respondWithCreated(c: Context, result: CreateReceiptsResult) {
  const body = {
    created: result.created.length,
    entries: result.created,
    rejected: result.rejected,
  };

  return result.created.length > 0 ? c.json(body, 201) : c.json(body, 422);
}
