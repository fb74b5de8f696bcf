/**
 * Translate "call completed" events from a data layer into log records,
 * escalating severity with elapsed time.
 */

import { inspect } from 'node:util';
import type { LevelLogger } from './level-logger.js';

export const SLOW_CALL_MS = 100;
export const NOTICE_CALL_MS = 50;

export type EventValue =
  | { readonly kind: 'error'; readonly error: Error }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'duration'; readonly ms: number }
  | { readonly kind: 'date'; readonly value: Date }
  | { readonly kind: 'other'; readonly value: unknown };

export type InstrumentationEvent =
  | {
      readonly kind: 'call';
      readonly category: string;
      readonly source: string;
      readonly durationMs: number;
      readonly statement: string;
      readonly values: readonly EventValue[];
    }
  | {
      readonly kind: 'log';
      readonly category: string;
      readonly source: string;
      readonly values: readonly EventValue[];
    }
  | {
      readonly kind: 'dump';
      readonly category?: string;
      readonly source?: string;
      readonly values: readonly EventValue[];
    };

export type CallSeverity = 'debug' | 'info' | 'warn';

export function toEventValue(value: unknown): EventValue {
  if (value instanceof Error) return { kind: 'error', error: value };
  if (value instanceof Date) return { kind: 'date', value };
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'number':
      return { kind: 'number', value };
    case 'boolean':
      return { kind: 'boolean', value };
    default:
      return { kind: 'other', value };
  }
}

export function renderValue(value: EventValue): string {
  switch (value.kind) {
    case 'error':
      return value.error.message;
    case 'string':
      return value.value;
    case 'number':
    case 'boolean':
      return String(value.value);
    case 'duration':
      return `${value.ms}ms`;
    case 'date':
      return value.value.toISOString();
    case 'other':
      return inspect(value.value, { breakLength: Infinity });
    default: {
      const unreachable: never = value;
      return String(unreachable);
    }
  }
}

export function renderValues(values: readonly EventValue[]): string {
  return `[${values.map(renderValue).join(', ')}]`;
}

/**
 * `> 100ms` warn, `> 50ms` info, anything faster debug
 */
export function severityForDuration(durationMs: number): CallSeverity {
  if (durationMs > SLOW_CALL_MS) return 'warn';
  if (durationMs > NOTICE_CALL_MS) return 'info';
  return 'debug';
}

/**
 * Whole microseconds elapsed, truncated
 */
export function toMicroseconds(durationMs: number): number {
  return Math.trunc(Math.round(durationMs * 1e6) / 1e3);
}

function isStatementPayload(
  payload: readonly unknown[],
): payload is [number, string, unknown[]?, ...unknown[]] {
  return (
    typeof payload[0] === 'number' &&
    typeof payload[1] === 'string' &&
    (payload[2] === undefined || Array.isArray(payload[2]))
  );
}

/**
 * Classify untyped ORM-style arguments: `category, source, ...payload`
 */
export function parseEvent(values: readonly unknown[]): InstrumentationEvent {
  if (values.length <= 1) {
    return { kind: 'dump', values: values.map(toEventValue) };
  }

  const [category, source, ...payload] = values;
  const tags = { category: String(category), source: String(source) };

  if (tags.category === 'sql' && isStatementPayload(payload)) {
    const [durationMs, statement, bound = []] = payload;
    return { kind: 'call', ...tags, durationMs, statement, values: bound.map(toEventValue) };
  }
  if (tags.category === 'log') {
    return { kind: 'log', ...tags, values: payload.map(toEventValue) };
  }
  return { kind: 'dump', ...tags, values: payload.map(toEventValue) };
}

/**
 * Adapter that logs data-layer calls through a LevelLogger
 */
export class QueryLogger {
  constructor(private readonly logger: LevelLogger) {}

  /**
   * Entry point for loggers that hand over a loose argument list
   */
  print(...values: unknown[]): void {
    this.record(parseEvent(values));
  }

  record(event: InstrumentationEvent): void {
    const logger =
      event.category === undefined
        ? this.logger
        : this.logger.with({ type: event.category, source: event.source });

    switch (event.kind) {
      case 'call':
        return this.logCall(logger, event.durationMs, event.statement, event.values);
      case 'log':
        return this.logValues(logger, event.values);
      case 'dump':
        return logger.info().log({ msg: renderValues(event.values) });
    }
  }

  /**
   * Time an async call and record it as a `sql` event, whatever its outcome
   */
  async instrument<T>(
    statement: string,
    values: readonly unknown[],
    fn: () => Promise<T>,
    source = 'instrument',
  ): Promise<T> {
    const started = performance.now();
    try {
      return await fn();
    } finally {
      this.record({
        kind: 'call',
        category: 'sql',
        source,
        durationMs: performance.now() - started,
        statement,
        values: values.map(toEventValue),
      });
    }
  }

  private logCall(
    logger: LevelLogger,
    durationMs: number,
    statement: string,
    values: readonly EventValue[],
  ): void {
    const fields: Record<string, unknown> = {
      query_us: toMicroseconds(durationMs),
      query: statement,
    };
    if (values.length > 0) {
      fields.values = renderValues(values);
    }
    logger[severityForDuration(durationMs)]().log(fields);
  }

  private logValues(logger: LevelLogger, values: readonly EventValue[]): void {
    if (values.length === 1) {
      const [value] = values;
      if (value.kind === 'error') {
        logger.error().log({ msg: value.error.message });
        return;
      }
      logger.info().log({ msg: renderValue(value) });
      return;
    }
    logger.info().log({ msg: renderValues(values) });
  }
}
