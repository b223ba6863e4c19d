/**
 * @kakeibo/core - Domain logic for the household ledger
 *
 * Receipt validation, the in-memory ledger store, and the query, aggregation
 * and export engines. Everything here is transport-agnostic and consumed by
 * the API layer.
 */

export * from './ledger/index.js';
