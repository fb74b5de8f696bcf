import type { IncomingMessage } from 'node:http';
import { toError } from '../shared/errors.js';
import type { LevelLogger } from '../logging/level-logger.js';

/**
 * Receives errors raised while serving a request
 */
export interface Notifier {
  notify(error: unknown, request?: IncomingMessage): void;
}

/**
 * Notifier that logs every error through the leveled logger
 */
export class LogNotifier implements Notifier {
  constructor(private readonly logger: LevelLogger) {}

  notify(error: unknown, request?: IncomingMessage): void {
    const logger = request
      ? this.logger.with({ method: request.method, url: request.url })
      : this.logger;
    logger.wrapError(toError(error)).log({ during: 'Notifier.notify' });
  }
}
