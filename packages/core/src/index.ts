/**
 * @fileoverview Main entry point for @rudder/core
 *
 * Typed values, local and remote settings, and the configuration commands
 * of the rudder torrent client.
 */

export { VERSION, NAME } from './constants.js';

export * from './errors/index.js';
export * from './logging/index.js';
export * from './values/index.js';
export * from './api/index.js';
export * from './settings/index.js';
export * from './keymap/index.js';
export * from './commands/index.js';
export * from './runtime/index.js';
export * from './utils/index.js';
