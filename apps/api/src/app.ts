import { Hono } from 'hono';
import type { LedgerService } from '@kakeibo/core';
import type { Logger } from '@kakeibo/observability';
import type { AppConfig } from './config.js';
import { createCorsMiddleware } from './middleware/cors.js';
import { createErrorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLogger } from './middleware/request-logger.js';
import { clearRoute } from './routes/v1/clear.js';
import { createEntriesRoute, entriesRoute } from './routes/v1/entries/index.js';
import { exportRoute } from './routes/v1/export.js';
import { healthRoute } from './routes/v1/health.js';
import { sampleRoute } from './routes/v1/sample.js';
import { summaryRoute } from './routes/v1/summary.js';
import type { AppBindings } from './types/context.js';

export interface AppDependencies {
  ledgerService: LedgerService;
  logger: Logger;
  config: Pick<AppConfig, 'webAppUrl' | 'version'>;
}

export function createApp({ ledgerService, logger, config }: AppDependencies) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.use('*', createCorsMiddleware(config.webAppUrl));

  app.use('*', requestLogger(logger));

  app.use('*', async (c, next) => {
    c.set('ledgerService', ledgerService);
    c.set('appVersion', config.version);
    await next();
  });

  app.onError(createErrorHandler(logger));
  app.notFound(notFoundHandler);

  app.route('/health', healthRoute);

  // Root aliases: browsing lands on the listing, posting inserts receipts
  app.get('/', (c) => c.redirect('/v1/entries', 307));
  app.route('/', createEntriesRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();

  v1.route('/health', healthRoute);
  v1.route('/entries', entriesRoute);
  v1.route('/summary', summaryRoute);
  v1.route('/export', exportRoute);
  v1.route('/sample', sampleRoute);
  v1.route('/clear', clearRoute);

  app.route('/v1', v1);

  return app;
}

export type App = ReturnType<typeof createApp>;
