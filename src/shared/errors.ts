/**
 * Error handling module - error codes and contextual errors for the telemetry facade
 */

/**
 * Error codes raised by the facade. Only configuration codes ever reach
 * callers as thrown errors; the rest end up as log records.
 */
export enum ErrorCode {
  // Configuration errors
  CONFIG_PARSE_ERROR = 'CONFIG_PARSE_ERROR',
  CONFIG_NOT_ABSOLUTE = 'CONFIG_NOT_ABSOLUTE',
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Backend errors
  BACKEND_UNREACHABLE = 'BACKEND_UNREACHABLE',

  // Test doubles
  UNEXPECTED_NOTIFICATION = 'UNEXPECTED_NOTIFICATION',
}

/**
 * Error details - structured key-values carried alongside the message
 */
export type ErrorDetails = Record<string, unknown>;

export interface ContextualErrorOptions {
  cause?: unknown;
}

/**
 * Error that carries structured details, folded into log records by
 * LevelLogger.withError.
 */
export class ContextualError extends Error {
  public readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}, options: ContextualErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ContextualError';
    this.details = { ...details };

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Key-values this error contributes to an error context
   */
  contextFields(): ErrorDetails {
    return this.details;
  }
}

/**
 * Custom error class that carries error code and details
 */
export class TelemetryError extends ContextualError {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails, options?: ContextualErrorOptions) {
    super(message, details, options);
    this.name = 'TelemetryError';
    this.code = code;
  }

  override contextFields(): ErrorDetails {
    return { code: this.code, ...this.details };
  }
}

export function isTelemetryError(error: unknown, code?: ErrorCode): error is TelemetryError {
  return error instanceof TelemetryError && (code === undefined || error.code === code);
}

/**
 * Coerce anything thrown into an Error without altering it when it already is one
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}

/**
 * Helper to throw common errors
 */
export const Errors = {
  configParse: (url: string, cause?: unknown) =>
    new TelemetryError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `couldn't parse influxdb url ${url}`,
      { url },
      { cause },
    ),

  configNotAbsolute: (url: string) =>
    new TelemetryError(
      ErrorCode.CONFIG_NOT_ABSOLUTE,
      `influxdb monitoring url ${url} not absolute url`,
      { url },
    ),

  configInvalid: (reason: string, details?: ErrorDetails) =>
    new TelemetryError(ErrorCode.CONFIG_INVALID, `Invalid configuration: ${reason}`, details),

  unsupportedScheme: (scheme: string) =>
    new TelemetryError(
      ErrorCode.CONFIG_INVALID,
      `Invalid configuration: influxdb scheme "${scheme}" is not http or https`,
      { scheme },
    ),

  backendUnreachable: (hosts: number) =>
    new TelemetryError(
      ErrorCode.BACKEND_UNREACHABLE,
      `none of ${hosts} influxdb hosts answered the ping`,
      { hosts },
    ),

  unexpectedNotification: (error: unknown) =>
    new TelemetryError(
      ErrorCode.UNEXPECTED_NOTIFICATION,
      `unexpected error notification: ${toError(error).message}`,
      {},
      { cause: error },
    ),
};
