import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { resolveCaller, rfc3339Nano } from '../src/logging/caller.js';

const INTERNAL = fileURLToPath(new URL('../src/logging/level-logger.ts', import.meta.url));

describe('rfc3339Nano', () => {
  it('formats nanoseconds since the epoch', () => {
    expect(rfc3339Nano(1_704_164_645_123_456_789n)).toBe('2024-01-02T03:04:05.123456789Z');
  });

  it('pads the fraction to nine digits', () => {
    expect(rfc3339Nano(1_704_164_645_000_000_042n)).toBe('2024-01-02T03:04:05.000000042Z');
  });

  it('defaults to the current time', () => {
    const before = Date.now();
    const parsed = Date.parse(rfc3339Nano());

    expect(parsed).toBeGreaterThanOrEqual(before - 1000);
    expect(parsed).toBeLessThanOrEqual(Date.now() + 1000);
  });
});

describe('resolveCaller', () => {
  it('skips frames inside the logging package', () => {
    const stack = [
      'Error',
      `    at LevelLogger.log (${INTERNAL}:120:7)`,
      '    at handleRequest (/srv/app/routes/users.ts:42:13)',
      '    at main (/srv/app/index.ts:3:1)',
    ].join('\n');

    expect(resolveCaller(stack)).toBe('users.ts:42');
  });

  it('reads file URLs and anonymous frames', () => {
    const stack = ['Error', '    at file:///srv/app/jobs/nightly.ts:9:3'].join('\n');

    expect(resolveCaller(stack)).toBe('nightly.ts:9');
  });

  it('skips node internals', () => {
    const stack = [
      'Error',
      '    at process.processTicksAndRejections (node:internal/process/task_queues:95:5)',
      '    at async run (/srv/app/worker.ts:17:5)',
    ].join('\n');

    expect(resolveCaller(stack)).toBe('worker.ts:17');
  });

  it('returns undefined without usable frames', () => {
    expect(resolveCaller('Error')).toBeUndefined();
    expect(resolveCaller('')).toBeUndefined();
  });
});
