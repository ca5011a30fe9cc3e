/**
 * @fileoverview Centralized logging for rudder
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output for production
 * - Pretty printing for development terminals
 * - Context-aware child loggers
 *
 * Everything goes to stderr so command output on stdout stays clean.
 */

import pino from 'pino';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  command?: string;
  setting?: string;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  // Default to 'warn' so interactive use stays quiet
  // Use LOG_LEVEL=info or LOG_LEVEL=debug for verbose output
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');
  const pretty = options.pretty ?? (process.env.NODE_ENV !== 'production' && Boolean(process.stderr.isTTY));

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'rudder',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

/**
 * Pino instance a child logger writes through, plus every logger sharing its root
 */
export interface LoggerLineage {
  pino: pino.Logger;
  family: pino.Logger[];
}

export class RudderLogger {
  private pino: pino.Logger;
  private context: LogContext;
  // Every pino instance derived from the same root, so level changes reach all of them
  private family: pino.Logger[];

  constructor(options: LoggerOptions = {}, context: LogContext = {}, lineage?: LoggerLineage) {
    this.pino = lineage?.pino ?? createPinoLogger(options);
    this.context = context;
    this.family = lineage?.family ?? [];
    this.family.push(this.pino);
  }

  /**
   * Create a child logger with additional context; it shares the parent's transport
   */
  child(context: LogContext): RudderLogger {
    return new RudderLogger({}, { ...this.context, ...context }, {
      pino: this.pino.child(context),
      family: this.family,
    });
  }

  get bindings(): LogContext {
    return { ...this.context };
  }

  get level(): string {
    return this.pino.level;
  }

  setLevel(level: LogLevel): void {
    for (const logger of this.family) {
      logger.level = level;
    }
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  /**
   * Log with timing wrapper
   */
  async timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.debug(`${label} completed`, { durationMs: (performance.now() - start).toFixed(2) });
      return result;
    } catch (error) {
      this.debug(`${label} failed`, {
        durationMs: (performance.now() - start).toFixed(2),
        err: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
  }
}

// =============================================================================
// Default Logger
// =============================================================================

let defaultLogger: RudderLogger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(options?: LoggerOptions): RudderLogger {
  if (!defaultLogger) {
    defaultLogger = new RudderLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): RudderLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Change the level of the default logger and every child created from it
 */
export function setLogLevel(level: LogLevel): void {
  getLogger().setLevel(level);
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
