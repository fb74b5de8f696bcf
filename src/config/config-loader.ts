/**
 * Environment configuration, read once at the process boundary.
 * The logger and the metrics sink only ever see the resulting value.
 */

import { z } from 'zod';
import { Errors } from '../shared/errors.js';
import { createLogger, type LevelLogger, type LevelName } from '../logging/level-logger.js';

export const HUMAN_LOG_ENV = 'TELEMETRY_LOG_HUMAN';
export const LOG_LEVEL_ENV = 'TELEMETRY_LOG_LEVEL';
export const INFLUXDB_URL_ENV = 'TELEMETRY_INFLUXDB_URL';
export const PROBE_INTERVAL_ENV = 'TELEMETRY_PROBE_INTERVAL_MS';

export interface TelemetryConfig {
  readonly humanLogs: boolean;
  readonly logLevel: LevelName;
  readonly influxdbUrl?: string;
  readonly probeIntervalMs?: number;
}

const FALSEY = new Set(['', 'false', '0']);

/**
 * `""`, `false` and `0` (any case) are off; any other value is on
 */
export function isToggleOn(value: string | undefined): boolean {
  return value !== undefined && !FALSEY.has(value.trim().toLowerCase());
}

const EnvSchema = z.object({
  [HUMAN_LOG_ENV]: z.string().optional(),
  [LOG_LEVEL_ENV]: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .optional(),
  [INFLUXDB_URL_ENV]: z
    .string()
    .transform((value) => value.trim())
    .optional(),
  [PROBE_INTERVAL_ENV]: z.coerce.number().int().positive().optional(),
});

export function loadTelemetryConfig(env: NodeJS.ProcessEnv = process.env): TelemetryConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw Errors.configInvalid(issues.join('; '), { issues });
  }

  const data = parsed.data;
  const url = data[INFLUXDB_URL_ENV];

  return Object.freeze({
    humanLogs: isToggleOn(data[HUMAN_LOG_ENV]),
    logLevel: data[LOG_LEVEL_ENV] ?? 'debug',
    ...(url ? { influxdbUrl: url } : {}),
    ...(data[PROBE_INTERVAL_ENV] !== undefined ? { probeIntervalMs: data[PROBE_INTERVAL_ENV] } : {}),
  });
}

/**
 * Logger configured from the environment: logfmt on stdout unless
 * TELEMETRY_LOG_HUMAN is on.
 */
export function defaultLogger(env: NodeJS.ProcessEnv = process.env): LevelLogger {
  const config = loadTelemetryConfig(env);
  return createLogger({ human: config.humanLogs, level: config.logLevel });
}
