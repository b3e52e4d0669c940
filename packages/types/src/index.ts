/**
 * DentalCore Types Package
 *
 * Zod schemas and inferred types shared by the ledger domain, its
 * persistence adapters and the HTTP API.
 *
 * @module @dentalcore/types
 */

export * from './schemas/index.js';
