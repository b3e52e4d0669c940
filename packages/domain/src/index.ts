/**
 * @fileoverview Domain Package Exports
 *
 * @module @dentalcore/domain
 */

export * from './tooth-history/index.js';
