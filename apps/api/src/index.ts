import { serve } from '@hono/node-server';
import { createLogger } from '@kakeibo/observability';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { createServices } from './services/index.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, base: { service: 'kakeibo-api', env: config.env } });

const { ledgerStore, ledgerEvents, ledgerService } = createServices(config);

// Initialize audit logging for ledger events
initializeAuditLogging(ledgerEvents, logger);

const app = createApp({ ledgerService, logger, config });

logger.info({ host: config.host, port: config.port, maxRecords: config.maxRecords }, 'Starting server');

const server = serve(
  {
    fetch: app.fetch,
    hostname: config.host,
    port: config.port,
  },
  (info) => {
    logger.info({ port: info.port }, 'Server running');
  }
);

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  const discarded = await ledgerStore.count();
  logger.info({ signal, discarded }, 'Shutting down; in-memory receipts are discarded');

  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing server');
      process.exit(1);
    }
    process.exit(0);
  });
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
}
