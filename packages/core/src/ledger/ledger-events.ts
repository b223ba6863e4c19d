/**
 * Ledger event emitter for audit logging
 * Events are fire-and-forget so a slow or failing handler never blocks a ledger operation
 */

export type LedgerEventType =
  | 'ledger.receipts_created'
  | 'ledger.receipts_rejected'
  | 'ledger.cleared'
  | 'ledger.clear_refused'
  | 'ledger.sample_seeded';

/**
 * Base ledger event structure
 */
export interface LedgerEvent {
  type: LedgerEventType;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export type LedgerEventHandler = (event: LedgerEvent) => void | Promise<void>;

export type HandlerErrorCallback = (error: unknown, event: LedgerEvent) => void;

export class LedgerEventEmitter {
  private handlers: LedgerEventHandler[] = [];

  constructor(private onHandlerError: HandlerErrorCallback = () => {}) {}

  on(handler: LedgerEventHandler) {
    this.handlers.push(handler);
  }

  /**
   * Where handler failures go; the audit logger points this at its logger
   */
  setHandlerErrorCallback(callback: HandlerErrorCallback) {
    this.onHandlerError = callback;
  }

  emit(event: Omit<LedgerEvent, 'timestamp'>): void {
    const fullEvent: LedgerEvent = {
      ...event,
      timestamp: new Date(),
    };

    for (const handler of this.handlers) {
      // Each handler settles on its own so one failure doesn't hide another
      void Promise.resolve()
        .then(() => handler(fullEvent))
        .catch((error: unknown) => this.onHandlerError(error, fullEvent));
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}

/**
 * The subset of the emitter the ledger service needs
 */
export interface LedgerEvents {
  emit(event: Omit<LedgerEvent, 'timestamp'>): void;
}
