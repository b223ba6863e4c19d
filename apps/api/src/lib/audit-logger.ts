import type { LedgerEvent, LedgerEventEmitter } from '@kakeibo/core';
import type { Logger } from '@kakeibo/observability';

/**
 * Initialize audit logging for ledger events
 * Every mutation of the ledger leaves a structured log line
 */
export function initializeAuditLogging(events: LedgerEventEmitter, logger: Logger) {
  const auditLogger = logger.child({ component: 'audit' });

  events.setHandlerErrorCallback((err, event) => {
    auditLogger.error({ err, event: event.type }, 'Ledger event handler failed');
  });
  events.on((event) => handleLedgerEvent(auditLogger, event));

  auditLogger.info('Audit logging initialized for ledger events');
}

/**
 * Log a ledger event at a level matching its severity
 */
export function handleLedgerEvent(logger: Logger, event: LedgerEvent) {
  const { type, timestamp, metadata } = event;

  const logEntry = {
    event: type,
    timestamp: timestamp.toISOString(),
    ...(metadata && { metadata }),
  };

  switch (type) {
    case 'ledger.receipts_created':
      logger.info(logEntry, 'Receipts created');
      break;

    case 'ledger.receipts_rejected':
      logger.warn(logEntry, 'Receipts rejected');
      break;

    case 'ledger.cleared':
      logger.warn(logEntry, 'Ledger cleared');
      break;

    case 'ledger.clear_refused':
      logger.warn(logEntry, 'Ledger clear refused without confirmation');
      break;

    case 'ledger.sample_seeded':
      logger.info(logEntry, 'Sample receipts seeded');
      break;
  }
}
