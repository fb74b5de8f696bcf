import { createLogger, type LevelLogger, type LoggerOptions } from '../src/logging/level-logger.js';
import type { MeasurementPoint, MetricsBackend } from '../src/monitoring/types.js';

export const FIXED_TS = '2024-01-02T03:04:05.000000006Z';

/**
 * Logger writing logfmt lines into an array, with a fixed clock and no caller
 */
export function captureLogger(options: Omit<LoggerOptions, 'destination'> = {}): {
  logger: LevelLogger;
  lines: string[];
} {
  const lines: string[] = [];
  const logger = createLogger({
    timestamp: () => FIXED_TS,
    caller: false,
    ...options,
    destination: {
      write: (line: string) => {
        lines.push(line.trimEnd());
      },
    },
  });
  return { logger, lines };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * In-memory backend that records writes and pings
 */
export class FakeBackend implements MetricsBackend {
  concurrencySafe = true;
  readonly written: Array<{ database: string; point: MeasurementPoint }> = [];
  pings = 0;
  closed = false;
  writeError?: Error;
  pingError?: Error;

  async write(database: string, point: MeasurementPoint): Promise<void> {
    if (this.writeError) {
      throw this.writeError;
    }
    this.written.push({ database, point });
  }

  async ping(): Promise<void> {
    this.pings++;
    if (this.pingError) {
      throw this.pingError;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
