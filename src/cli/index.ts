#!/usr/bin/env node

/**
 * CLI entry point for the telemetry facade
 *
 * Reads TELEMETRY_* environment variables; see src/config/config-loader.ts.
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { output } from './utils/output.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Load package.json for version info
const PackageJson = z.object({ version: z.string() });
const packageJson = PackageJson.parse(
  JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')),
);

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('telemetry')
  .description('Leveled structured logging and InfluxDB metrics from the command line')
  .version(packageJson.version);

program
  .command('ping [url]')
  .description('Check once whether the InfluxDB backend answers')
  .option('--timeout <ms>', 'Ping timeout in milliseconds')
  .action(async (url, options) => {
    const { pingCommand } = await import('./commands/ping.js');
    await pingCommand(url, options);
  });

program
  .command('count <measurement> [value]')
  .description('Submit one measurement (value defaults to 1)')
  .option('-t, --tag <key=value>', 'Tag to attach (repeatable)', collect)
  .option('--url <url>', 'InfluxDB url, overrides TELEMETRY_INFLUXDB_URL')
  .action(async (measurement, value, options) => {
    const { countCommand } = await import('./commands/count.js');
    await countCommand(measurement, value, options);
  });

program
  .command('log <message>')
  .description('Emit one log record')
  .addOption(
    new Option('-l, --level <level>', 'Record severity')
      .choices(['debug', 'info', 'warn', 'error', 'crit'])
      .default('info'),
  )
  .option('-f, --field <key=value>', 'Field to attach (repeatable)', collect)
  .option('--human', 'Human-readable output')
  .action(async (message, options) => {
    const { logCommand } = await import('./commands/log.js');
    logCommand(message, options);
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  output.fail(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
