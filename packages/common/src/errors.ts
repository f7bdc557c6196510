/**
 * Custom error classes for consistent error handling
 */

/**
 * Base error class for all hook-gate errors
 */
export class GateError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'GateError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Validation error for invalid input data or rule definitions
 */
export class ValidationError extends GateError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Configuration file could not be read or did not validate
 */
export class ConfigError extends GateError {
  public readonly configPath?: string;

  constructor(message: string, options?: { configPath?: string; details?: unknown }) {
    super(message, 'CONFIG_ERROR', options?.details);
    this.name = 'ConfigError';
    this.configPath = options?.configPath;
  }
}

/**
 * External process failed to start or exited non-zero
 */
export class ProcessError extends GateError {
  public readonly command: string;
  public readonly exitCode?: number;

  constructor(message: string, options: { command: string; exitCode?: number; details?: unknown }) {
    super(message, 'PROCESS_ERROR', options.details);
    this.name = 'ProcessError';
    this.command = options.command;
    this.exitCode = options.exitCode;
  }
}

/**
 * Timeout error for operations that exceed time limits
 */
export class TimeoutError extends GateError {
  public readonly timeoutMs?: number;

  constructor(message: string, timeoutMs?: number, details?: unknown) {
    super(message, 'TIMEOUT', details);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap an unknown error as a GateError
 */
export function wrapError(error: unknown, defaultMessage = 'An error occurred'): GateError {
  if (error instanceof GateError) return error;
  if (error instanceof Error) {
    return new GateError(error.message, 'UNKNOWN_ERROR', {
      originalName: error.name,
      stack: error.stack,
    });
  }
  return new GateError(defaultMessage, 'UNKNOWN_ERROR', { originalError: error });
}

/**
 * Human-readable description of anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string' && error.length > 0) {
    return error;
  }
  return String(error) || 'Unknown error';
}
