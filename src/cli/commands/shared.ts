import { Errors } from '../../shared/errors.js';
import { INFLUXDB_URL_ENV, type TelemetryConfig } from '../../config/config-loader.js';
import type { LineWriter } from '../../logging/destinations.js';
import type { MetricsBackend, Tags } from '../../monitoring/types.js';

/**
 * What a command reads and writes besides its arguments; defaults to the
 * process environment, stdout and an influx client
 */
export interface CommandIO {
  env?: NodeJS.ProcessEnv;
  destination?: LineWriter;
  backend?: MetricsBackend;
}

export function resolveUrl(url: string | undefined, config: TelemetryConfig): string {
  const resolved = url ?? config.influxdbUrl;
  if (resolved === undefined) {
    throw Errors.configInvalid(`pass a url or set ${INFLUXDB_URL_ENV}`);
  }
  return resolved;
}

/**
 * Parse repeated `key=value` options into a tag set; later keys win
 */
export function parseTags(pairs: readonly string[]): Tags {
  const tags: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw Errors.configInvalid(`tag "${pair}" is not key=value`, { tag: pair });
    }
    tags[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return tags;
}

export function parseValue(raw: string | undefined): number {
  if (raw === undefined) {
    return 1;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw Errors.configInvalid(`value "${raw}" is not a number`, { value: raw });
  }
  return value;
}
