/**
 * @fileoverview Error types
 *
 * Typed error hierarchy shared by values, settings and commands. Callers
 * branch on the class (or `code`) instead of matching message text.
 */

/**
 * Centralized error codes
 */
export const ErrorCodes = {
  VALIDATION: 'VALIDATION',
  CONNECTIVITY: 'CONNECTIVITY',
  NOT_FOUND: 'NOT_FOUND',
  NOT_IMPLEMENTED: 'NOT_IMPLEMENTED',
  SHELL_EVAL: 'SHELL_EVAL',
  COMMAND: 'COMMAND',
  RC_FILE: 'RC_FILE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class
 */
export class RudderError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'RudderError';
  }
}

/**
 * Malformed or out-of-constraint input to a value constructor
 */
export class ValidationError extends RudderError {
  constructor(
    message: string,
    public readonly input?: unknown
  ) {
    super(ErrorCodes.VALIDATION, message);
    this.name = 'ValidationError';
  }
}

/**
 * A remote operation failed in transport
 */
export class ConnectivityError extends RudderError {
  constructor(message: string) {
    super(ErrorCodes.CONNECTIVITY, message);
    this.name = 'ConnectivityError';
  }
}

/**
 * Unknown setting name
 */
export class SettingNotFoundError extends RudderError {
  constructor(public readonly setting: string) {
    super(ErrorCodes.NOT_FOUND, `Unknown setting: ${setting}`);
    this.name = 'SettingNotFoundError';
  }
}

/**
 * Remote settings have no local default to return to
 */
export class RemoteResetError extends RudderError {
  constructor(public readonly setting: string) {
    super(ErrorCodes.NOT_IMPLEMENTED, `Remote settings cannot be reset: ${setting}`);
    this.name = 'RemoteResetError';
  }
}

/**
 * An evaluated shell command wrote to stderr
 */
export class ShellEvalError extends RudderError {
  constructor(
    public readonly stderr: string,
    public readonly exitCode: number | null
  ) {
    super(ErrorCodes.SHELL_EVAL, stderr);
    this.name = 'ShellEvalError';
  }
}

/**
 * User-visible command failure. An empty message means the command has
 * already reported its errors.
 */
export class CommandError extends RudderError {
  constructor(message = '') {
    super(ErrorCodes.COMMAND, message);
    this.name = 'CommandError';
  }
}

/**
 * rc file could not be read
 */
export class RcFileError extends RudderError {
  constructor(message: string) {
    super(ErrorCodes.RC_FILE, message);
    this.name = 'RcFileError';
  }
}

export function isRudderError(error: unknown): error is RudderError {
  return error instanceof RudderError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isConnectivityError(error: unknown): error is ConnectivityError {
  return error instanceof ConnectivityError;
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
