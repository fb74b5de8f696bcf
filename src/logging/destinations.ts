/**
 * Destinations that turn pino's JSON lines into the two supported encodings:
 * logfmt for machines, pino-pretty for humans.
 *
 * The logger hands pino one ordered pair list per record under PAIRS_KEY, so
 * repeated keys and their order survive the trip through JSON.
 */

import pino, { type DestinationStream } from 'pino';
import { prettyFactory } from 'pino-pretty';
import logfmt from 'logfmt';
import { z } from 'zod';

export const PAIRS_KEY = 'pairs';

/**
 * Anything that accepts a rendered line
 */
export interface LineWriter {
  write(line: string): unknown;
}

type Scalar = string | number | boolean | null;

const PinoLine = z.object({
  level: z.union([z.number(), z.string()]),
  [PAIRS_KEY]: z.array(z.tuple([z.string(), z.unknown()])),
});

type Pair = readonly [key: string, value: unknown];

function toScalar(value: unknown): Scalar {
  if (value === null || typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? null;
}

function levelLabel(level: unknown): Scalar {
  if (typeof level === 'number') {
    return pino.levels.labels[level] ?? level;
  }
  return toScalar(level);
}

/**
 * One `key=value` pair. Line breaks become `\n` and `\r` inside a quoted value.
 */
function encodePair(key: string, value: Scalar): string {
  const encoded = logfmt.stringify({ [key]: value });
  if (!/[\r\n]/.test(encoded)) {
    return encoded;
  }

  const raw = encoded.slice(key.length + 1);
  const quoted = raw.startsWith('"') ? raw : `"${raw}"`;
  return `${key}=${quoted.replace(/\r/g, '\\r').replace(/\n/g, '\\n')}`;
}

function recordPairs(json: string): { level: unknown; pairs: Pair[] } {
  const record: unknown = JSON.parse(json);
  const line = PinoLine.safeParse(record);
  if (line.success) {
    return { level: line.data.level, pairs: line.data[PAIRS_KEY] };
  }

  if (typeof record !== 'object' || record === null) {
    return { level: undefined, pairs: [['msg', record]] };
  }
  const { level, ...rest } = Object.fromEntries(Object.entries(record));
  return { level, pairs: Object.entries(rest) };
}

/**
 * Render one pino JSON line as a logfmt line, `level` first and then every
 * pair in the order it was added
 */
export function formatLogfmt(json: string): string {
  const { level, pairs } = recordPairs(json);

  const encoded = pairs.map(([key, value]) => encodePair(key, toScalar(value)));
  if (level !== undefined) {
    encoded.unshift(encodePair('level', levelLabel(level)));
  }
  return `${encoded.join(' ')}\n`;
}

export function logfmtDestination(out: LineWriter): DestinationStream {
  return {
    write(line: string) {
      out.write(formatLogfmt(line));
    },
  };
}

export interface HumanDestinationOptions {
  colorize?: boolean;
}

export function humanDestination(
  out: LineWriter,
  options: HumanDestinationOptions = {},
): DestinationStream {
  const prettify = prettyFactory({
    colorize: options.colorize ?? false,
    timestampKey: 'ts',
    messageKey: 'msg',
    ignore: 'pid,hostname',
  });

  return {
    write(line: string) {
      // pino-pretty renders a key map; a repeated key shows its last value
      const { level, pairs } = recordPairs(line);
      out.write(prettify({ level, ...Object.fromEntries(pairs) }));
    },
  };
}

/**
 * Synchronous stdout writer used when no destination is given
 */
export function stdoutWriter(): LineWriter {
  return pino.destination({ dest: 1, sync: true });
}
