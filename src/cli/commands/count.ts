/**
 * Count command - submit one measurement and wait for the write
 */

import { loadTelemetryConfig } from '../../config/config-loader.js';
import { createLogger } from '../../logging/level-logger.js';
import { createInfluxdbSink } from '../../monitoring/metrics-sink.js';
import { output } from '../utils/output.js';
import { parseTags, parseValue, resolveUrl, type CommandIO } from './shared.js';

interface CountOptions {
  tag?: string[];
  url?: string;
}

export async function countCommand(
  measurement: string,
  rawValue: string | undefined,
  options: CountOptions,
  io: CommandIO = {},
): Promise<void> {
  const config = loadTelemetryConfig(io.env);
  const value = parseValue(rawValue);
  const tags = parseTags(options.tag ?? []);
  const logger = createLogger({
    human: config.humanLogs,
    level: config.logLevel,
    destination: io.destination,
  });

  const sink = createInfluxdbSink(resolveUrl(options.url, config), logger, {
    backend: io.backend,
    probeIntervalMs: config.probeIntervalMs,
  });
  try {
    await sink.count(measurement, value, tags);
  } finally {
    await sink.close();
  }

  output.ok(`submitted ${measurement}=${value}`);
}
