/**
 * @fileoverview Main entry point for @rudder/cli
 */

export { main, parseCliArgs, helpText, type CliOptions, type CliOutput, type ParsedCliArgs } from './main.js';
export { createOfflineApi, OFFLINE_MESSAGE } from './offline-api.js';
