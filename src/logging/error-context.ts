/**
 * Error enrichment: turn an error (and its cause chain) into a message,
 * structured key-values and a stack trace for a log record.
 */

import { ContextualError, toError, type ErrorDetails } from '../shared/errors.js';
import type { Field } from './level-logger.js';

const MAX_CAUSE_DEPTH = 32;

export interface ErrorContext {
  readonly message: string;
  readonly context: readonly Field[];
  readonly stacktrace?: string;
}

/**
 * Wrap an error without touching it. The wrapper carries the optional
 * message and details and keeps the original as `cause`.
 */
export function wrapError(err: Error, message = '', details: ErrorDetails = {}): ContextualError {
  return new ContextualError(message, details, { cause: err });
}

function causeChain(err: Error): { errors: Error[]; tail?: unknown } {
  const errors: Error[] = [];
  let current: unknown = err;

  while (current instanceof Error && errors.length < MAX_CAUSE_DEPTH) {
    if (errors.includes(current)) break;
    errors.push(current);
    current = current.cause;
  }

  const tail = current instanceof Error || current === undefined ? undefined : current;
  return { errors, tail };
}

/**
 * Derive the error context once; the result is frozen.
 */
export function extractErrorContext(err: Error): ErrorContext {
  const { errors, tail } = causeChain(err);

  const messages = errors.map((e) => e.message).filter((m) => m.length > 0);
  if (tail !== undefined) {
    messages.push(toError(tail).message);
  }

  const context: Field[] = [];
  for (const e of errors) {
    if (e instanceof ContextualError) {
      for (const pair of Object.entries(e.contextFields())) {
        context.push(Object.freeze(pair));
      }
    }
  }

  const root = errors[errors.length - 1];
  const stacktrace = root?.stack;

  return Object.freeze({
    message: messages.join(': '),
    context: Object.freeze(context),
    ...(stacktrace ? { stacktrace } : {}),
  });
}
