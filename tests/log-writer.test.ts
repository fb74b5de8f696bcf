import { describe, it, expect } from 'vitest';
import type { Writable } from 'node:stream';
import { createLogWriter } from '../src/logging/log-writer.js';
import { captureLogger, FIXED_TS } from './helpers.js';

function end(writer: Writable): Promise<void> {
  return new Promise((resolve) => writer.end(() => resolve()));
}

describe('createLogWriter', () => {
  it('logs every chunk as a message', async () => {
    const { logger, lines } = captureLogger();
    const writer = createLogWriter(logger.with({ component: 'migrations' }));

    writer.write('applied 0001_init\n');
    writer.write(Buffer.from('applied 0002_users'));
    await end(writer);

    expect(lines).toEqual([
      `level=info ts=${FIXED_TS} component=migrations msg="applied 0001_init"`,
      `level=info ts=${FIXED_TS} component=migrations msg="applied 0002_users"`,
    ]);
  });

  it('keeps the severity of the logger it wraps', async () => {
    const { logger, lines } = captureLogger();
    const writer = createLogWriter(logger.warn());

    writer.write('deprecated option');
    await end(writer);

    expect(lines).toEqual([`level=warn ts=${FIXED_TS} msg="deprecated option"`]);
  });
});
