/**
 * HTTP test helpers for integration tests
 * Builds an isolated app per test and makes requests against it in process
 */

import { LedgerEventEmitter, LedgerService, LedgerStore } from '@kakeibo/core';
import { createLogger } from '@kakeibo/observability';
import type { Env, Hono } from 'hono';
import { createApp } from '../app.js';

export const TEST_WEB_APP_URL = 'http://localhost:5173';
export const TEST_VERSION = '0.0.0-test';

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app
 *
 * FormData bodies are sent as multipart; strings are sent as-is; anything
 * else is JSON encoded.
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: body instanceof FormData ? headers : { 'Content-Type': 'application/json', ...headers },
  };

  if (body instanceof FormData) {
    init.body = body;
  } else if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  const request = new Request(`http://localhost${path}`, init);
  return app.fetch(request);
}

export interface TestAppOptions {
  maxRecords?: number;
}

/**
 * Fresh app over an empty ledger with a silent logger
 */
export function createTestApp(options: TestAppOptions = {}) {
  const store = new LedgerStore({ maxRecords: options.maxRecords });
  const events = new LedgerEventEmitter();
  const ledgerService = new LedgerService(store, events);
  const logger = createLogger({ level: 'silent' });

  const app = createApp({
    ledgerService,
    logger,
    config: { webAppUrl: TEST_WEB_APP_URL, version: TEST_VERSION },
  });

  return { app, store, events, ledgerService };
}

/**
 * Build a multipart body carrying a CSV document in the `file` field
 */
export function csvUpload(document: string, fileName = 'entries.csv'): FormData {
  const form = new FormData();
  form.append('file', new Blob([document], { type: 'text/csv' }), fileName);
  return form;
}
