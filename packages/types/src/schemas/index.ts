/**
 * @fileoverview Consolidated schema exports
 *
 * @module types/schemas
 */

export * from './common.js';
export * from './dental-status.js';
export * from './tooth-chart.js';
