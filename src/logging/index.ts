/**
 * Logging module - exports the leveled logger, error enrichment and adapters
 */

export { LevelLogger, createLogger, RESERVED_KEYS } from './level-logger.js';
export type {
  Severity,
  LevelName,
  LogFields,
  Field,
  LoggerOptions,
  RecordSink,
  LineWriter,
} from './level-logger.js';

export { extractErrorContext, wrapError } from './error-context.js';
export type { ErrorContext } from './error-context.js';

export { resolveCaller, rfc3339Nano } from './caller.js';
export { formatLogfmt } from './destinations.js';

export {
  QueryLogger,
  parseEvent,
  renderValue,
  renderValues,
  severityForDuration,
  toEventValue,
  toMicroseconds,
  SLOW_CALL_MS,
  NOTICE_CALL_MS,
} from './call-instrumentation.js';
export type { EventValue, InstrumentationEvent, CallSeverity } from './call-instrumentation.js';

export { createLogWriter } from './log-writer.js';
