/**
 * @fileoverview Logging exports
 */

export {
  RudderLogger,
  getLogger,
  createLogger,
  setLogLevel,
  resetLogger,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';
