/**
 * @fileoverview Transfer API exports
 */

export * from './types.js';
export * from './schemas.js';
