/**
 * Log command - emit one record with the environment's log settings
 */

import { loadTelemetryConfig } from '../../config/config-loader.js';
import { createLogger, type Severity } from '../../logging/level-logger.js';
import { parseTags, type CommandIO } from './shared.js';

interface LogOptions {
  level: Severity;
  human?: boolean;
  field?: string[];
}

export function logCommand(message: string, options: LogOptions, io: CommandIO = {}): void {
  const config = loadTelemetryConfig(io.env);
  const logger = createLogger({
    human: options.human ?? config.humanLogs,
    level: config.logLevel,
    destination: io.destination,
  });

  const withFields = logger.with(parseTags(options.field ?? []));
  withFields[options.level]().log({ msg: message });
}
