import { Writable } from 'node:stream';
import type { LevelLogger } from './level-logger.js';

/**
 * Writable that turns every chunk into a `msg` record, for libraries that
 * only know how to write to a stream.
 */
export function createLogWriter(logger: LevelLogger): Writable {
  return new Writable({
    decodeStrings: false,
    write(chunk: Buffer | string, _encoding, callback) {
      const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      logger.log({ msg: text.replace(/\n$/, '') });
      callback();
    },
  });
}
