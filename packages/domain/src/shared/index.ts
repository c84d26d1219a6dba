/**
 * @fileoverview Shared Domain Utilities
 *
 * @module domain/shared
 */

export * from './types.js';
