/**
 * Service Registry
 *
 * Builds the ledger store and the services that use it.
 * One registry per process: the store lives exactly as long as the registry
 * and is handed to the app by reference.
 */

import { LedgerEventEmitter, LedgerService, LedgerStore } from '@kakeibo/core';
import type { AppConfig } from '../config.js';

export interface Services {
  ledgerStore: LedgerStore;
  ledgerEvents: LedgerEventEmitter;
  ledgerService: LedgerService;
}

export function createServices(config: Pick<AppConfig, 'maxRecords'>): Services {
  const ledgerStore = new LedgerStore({ maxRecords: config.maxRecords });
  const ledgerEvents = new LedgerEventEmitter();
  const ledgerService = new LedgerService(ledgerStore, ledgerEvents);

  return { ledgerStore, ledgerEvents, ledgerService };
}
