/**
 * Notifiers for use in tests
 */

import type { IncomingMessage } from 'node:http';
import { Errors } from '../shared/errors.js';
import type { Notifier } from './notifier.js';

export interface Notice {
  readonly error: unknown;
  readonly request?: IncomingMessage;
}

/**
 * Stores every notice it receives
 */
export class BufferNotifier implements Notifier {
  readonly notices: Notice[] = [];

  notify(error: unknown, request?: IncomingMessage): void {
    this.notices.push({ error, request });
  }
}

function failWith(error: unknown): never {
  throw Errors.unexpectedNotification(error);
}

/**
 * Fails the running test on any notification
 */
export class TestNotifier implements Notifier {
  constructor(private readonly fail: (error: unknown) => never = failWith) {}

  notify(error: unknown): void {
    this.fail(error);
  }
}
