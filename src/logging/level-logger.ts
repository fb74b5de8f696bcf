/**
 * Logger module - immutable, context-accumulating structured logger on top of pino
 */

import { pino, type Logger as PinoLogger, type DestinationStream } from 'pino';
import { resolveCaller, rfc3339Nano } from './caller.js';
import {
  PAIRS_KEY,
  humanDestination,
  logfmtDestination,
  stdoutWriter,
  type LineWriter,
} from './destinations.js';
import { extractErrorContext, wrapError } from './error-context.js';

export type Severity = 'debug' | 'info' | 'warn' | 'error' | 'crit';

export type LevelName = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export type Field = readonly [key: string, value: unknown];

/** Keys the logger writes itself; user pairs with these names get a `fields.` prefix */
export const RESERVED_KEYS: ReadonlySet<string> = new Set(['level', 'ts', 'caller']);

export interface LoggerOptions {
  /** Human-readable (pino-pretty) output instead of logfmt */
  human?: boolean;
  /** Minimum level written; defaults to debug */
  level?: LevelName;
  /** Where rendered lines go; defaults to stdout */
  destination?: LineWriter;
  /** Colorize human output */
  colorize?: boolean;
  /** Clock for the `ts` field; `false` drops the field */
  timestamp?: (() => string) | false;
  /** Add the `caller` field */
  caller?: boolean;
}

/**
 * Receives fully built records as ordered pairs. Implemented over pino, or
 * as a no-op.
 */
export interface RecordSink {
  readonly enabled: boolean;
  emit(level: LevelName, pairs: readonly Field[]): void;
}

class PinoRecordSink implements RecordSink {
  readonly enabled = true;

  constructor(private readonly logger: PinoLogger) {}

  emit(level: LevelName, pairs: readonly Field[]): void {
    this.logger[level]({ [PAIRS_KEY]: pairs });
  }
}

const NOP_SINK: RecordSink = {
  enabled: false,
  emit() {},
};

interface LoggerContext {
  readonly sink: RecordSink;
  readonly timestamp: (() => string) | false;
  readonly caller: boolean;
}

function levelOf(severity: Severity | undefined): LevelName {
  if (severity === undefined) return 'info';
  return severity === 'crit' ? 'error' : severity;
}

function renderValue(value: unknown): unknown {
  if (value instanceof Error) {
    return value.message;
  }
  return value;
}

function userKey(key: string): string {
  return RESERVED_KEYS.has(key) ? `fields.${key}` : key;
}

/**
 * Structured logger with value semantics: every derivation returns a new
 * logger and leaves the receiver untouched.
 */
export class LevelLogger {
  private constructor(
    private readonly context: LoggerContext,
    private readonly pairs: readonly Field[],
    private readonly severity: Severity | undefined,
  ) {}

  static fromSink(sink: RecordSink, options: Pick<LoggerOptions, 'timestamp' | 'caller'> = {}): LevelLogger {
    return new LevelLogger(
      {
        sink,
        timestamp: options.timestamp ?? rfc3339Nano,
        caller: options.caller ?? true,
      },
      [],
      undefined,
    );
  }

  /**
   * Logger that accepts all operations and writes nothing
   */
  static nop(): LevelLogger {
    return new LevelLogger({ sink: NOP_SINK, timestamp: false, caller: false }, [], undefined);
  }

  /** Pairs added so far, in append order */
  get fields(): readonly Field[] {
    return this.pairs;
  }

  /** Severity the next record will carry, if one was set */
  get level(): Severity | undefined {
    return this.severity;
  }

  with(fields: LogFields): LevelLogger {
    return this.append(Object.entries(fields));
  }

  debug(): LevelLogger {
    return this.at('debug');
  }

  info(): LevelLogger {
    return this.at('info');
  }

  warn(): LevelLogger {
    return this.at('warn');
  }

  error(): LevelLogger {
    return this.at('error');
  }

  crit(): LevelLogger {
    return this.at('crit');
  }

  /**
   * Wrap an error and add it to the record. A missing error is a no-op.
   */
  wrapError(err: Error | null | undefined): LevelLogger {
    if (err === null || err === undefined) {
      return this;
    }
    return this.withError(wrapError(err));
  }

  /**
   * Add an error's context, message and stack trace; forces error severity
   */
  withError(err: Error): LevelLogger {
    const { context, message, stacktrace } = extractErrorContext(err);
    const pairs: Field[] = [...context, ['msg', message]];
    if (stacktrace !== undefined && stacktrace.length > 0) {
      pairs.push(['stacktrace', stacktrace]);
    }
    return this.append(pairs).at('error');
  }

  /**
   * Build the record (ts, caller, then every pair in order) and write it.
   * The only call with a side effect.
   */
  log(fields: LogFields = {}): void {
    const { sink, timestamp, caller } = this.context;
    if (!sink.enabled) {
      return;
    }

    const record: Field[] = [];
    if (timestamp !== false) {
      record.push(['ts', timestamp()]);
    }
    if (caller) {
      const site = resolveCaller();
      if (site !== undefined) {
        record.push(['caller', site]);
      }
    }
    for (const [key, value] of [...this.pairs, ...Object.entries(fields)]) {
      record.push([userKey(key), renderValue(value)]);
    }

    sink.emit(levelOf(this.severity), record);
  }

  private append(pairs: readonly Field[]): LevelLogger {
    if (pairs.length === 0) {
      return this;
    }
    return new LevelLogger(this.context, [...this.pairs, ...pairs], this.severity);
  }

  private at(severity: Severity): LevelLogger {
    return new LevelLogger(this.context, this.pairs, severity);
  }
}

function destinationFor(options: LoggerOptions): DestinationStream {
  const out = options.destination ?? stdoutWriter();
  return options.human
    ? humanDestination(out, { colorize: options.colorize })
    : logfmtDestination(out);
}

/**
 * Create a logger from explicit options. Never reads the environment.
 */
export function createLogger(options: LoggerOptions = {}): LevelLogger {
  const base = pino(
    {
      level: options.level ?? 'debug',
      base: null,
      timestamp: false,
    },
    destinationFor(options),
  );

  return LevelLogger.fromSink(new PinoRecordSink(base), {
    timestamp: options.timestamp,
    caller: options.caller,
  });
}

export type { LineWriter };
