/**
 * Ping command - one reachability check against the configured backend
 */

import { loadTelemetryConfig } from '../../config/config-loader.js';
import { LevelLogger } from '../../logging/level-logger.js';
import { describeTarget, parseBackendConfig } from '../../monitoring/backend-config.js';
import { ConnectivityProbe } from '../../monitoring/connectivity-probe.js';
import { createInfluxBackend } from '../../monitoring/influx-backend.js';
import { output } from '../utils/output.js';
import { resolveUrl, type CommandIO } from './shared.js';

interface PingOptions {
  timeout?: string;
}

export async function pingCommand(
  url: string | undefined,
  options: PingOptions,
  io: CommandIO = {},
): Promise<void> {
  const target = parseBackendConfig(resolveUrl(url, loadTelemetryConfig(io.env)));
  const timeout = options.timeout === undefined ? undefined : Number(options.timeout);
  const backend = io.backend ?? createInfluxBackend(target, timeout);

  // the verdict is printed below; the probe's own warning would repeat it
  const probe = new ConnectivityProbe(backend, LevelLogger.nop());
  const state = await probe.check();
  await backend.close();

  if (state.status === 'reachable') {
    output.ok(`influxdb reachable at ${describeTarget(target)}`);
    return;
  }

  output.fail(`couldn't ping influxdb at ${describeTarget(target)}`);
  if (state.error) {
    output.note('error', state.error.message);
  }
  process.exitCode = 1;
}
