import type { MiddlewareHandler } from 'hono';
import type { Logger } from '@kakeibo/observability';
import type { AppBindings } from '../types/context.js';

/**
 * Attach a request-scoped child logger and log each completed request.
 * Must run after the request ID middleware.
 */
export function requestLogger(baseLogger: Logger): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const startedAt = Date.now();
    const log = baseLogger.child({ requestId: c.get('requestId') });
    c.set('logger', log);

    await next();

    const entry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - startedAt,
    };

    if (c.res.status >= 500) {
      log.error(entry, 'Request failed');
    } else {
      log.info(entry, 'Request completed');
    }
  };
}
