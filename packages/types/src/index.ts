/**
 * @kakeibo/types
 *
 * Shared zod schemas and inferred types for the ledger HTTP API
 */

export * from './receipt.schema.js';
export * from './health.schema.js';
