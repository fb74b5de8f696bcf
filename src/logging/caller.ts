/**
 * Timestamp and call-site helpers for log records
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';

const LOGGING_DIR = path.dirname(fileURLToPath(import.meta.url));

const originNs = BigInt(Date.now()) * 1_000_000n;
const originHr = process.hrtime.bigint();

// "    at fn (/abs/file.ts:12:5)" or "    at /abs/file.ts:12:5"
const FRAME = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

/**
 * Current wall-clock time in nanoseconds since the epoch
 */
export function nowNanos(): bigint {
  return originNs + (process.hrtime.bigint() - originHr);
}

/**
 * RFC3339 timestamp with nanosecond precision, always in UTC
 */
export function rfc3339Nano(ns: bigint = nowNanos()): string {
  const iso = new Date(Number(ns / 1_000_000n)).toISOString();
  const fraction = (ns % 1_000_000_000n).toString().padStart(9, '0');
  return `${iso.slice(0, 19)}.${fraction}Z`;
}

function framePath(location: string): string {
  return location.startsWith('file://') ? fileURLToPath(location) : location;
}

/**
 * Resolve `file:line` of the first frame outside the logging package.
 * Returns undefined when the stack cannot be read.
 */
export function resolveCaller(stack: string | undefined = new Error().stack): string | undefined {
  if (!stack) {
    return undefined;
  }

  for (const line of stack.split('\n').slice(1)) {
    const match = FRAME.exec(line);
    if (!match) continue;

    const file = framePath(match[1]);
    if (file.startsWith(LOGGING_DIR + path.sep) || file.startsWith('node:')) {
      continue;
    }
    return `${path.basename(file)}:${match[2]}`;
  }

  return undefined;
}
