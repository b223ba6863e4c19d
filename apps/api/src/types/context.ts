import type { LedgerService } from '@kakeibo/core';
import type { Logger } from '@kakeibo/observability';

/**
 * Shared Hono context variables for API requests.
 * The ledger service is injected per app instance, never imported as a singleton.
 */
export type ContextVariables = {
  requestId: string;
  logger: Logger;
  ledgerService: LedgerService;
  appVersion: string;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
