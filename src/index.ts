/**
 * Telemetry facade: leveled structured logging and fire-and-forget metrics.
 */

export * from './logging/index.js';
export * from './monitoring/index.js';
export * from './errornotifier/index.js';

export {
  ErrorCode,
  ContextualError,
  TelemetryError,
  Errors,
  isTelemetryError,
  toError,
} from './shared/errors.js';
export type { ErrorDetails, ContextualErrorOptions } from './shared/errors.js';

export {
  loadTelemetryConfig,
  defaultLogger,
  isToggleOn,
  HUMAN_LOG_ENV,
  LOG_LEVEL_ENV,
  INFLUXDB_URL_ENV,
  PROBE_INTERVAL_ENV,
} from './config/config-loader.js';
export type { TelemetryConfig } from './config/config-loader.js';
