import type { ErrorHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { Logger } from '@kakeibo/observability';
import type { AppBindings } from '../types/context.js';

/**
 * Last-resort error handler
 * Route handlers map domain errors themselves; anything reaching here is
 * either an HTTPException raised by Hono or an unexpected failure.
 */
export function createErrorHandler(baseLogger: Logger): ErrorHandler<AppBindings> {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message || 'Request failed' }, err.status);
    }

    baseLogger.error({ err, requestId: c.get('requestId') }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  };
}

export const notFoundHandler: NotFoundHandler<AppBindings> = (c) =>
  c.json({ error: 'Not found' }, 404);
