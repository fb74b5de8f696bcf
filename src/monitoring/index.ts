/**
 * Monitoring module - exports the metrics sink, its backends and the probe
 */

import type { TelemetryConfig } from '../config/config-loader.js';
import type { LevelLogger } from '../logging/level-logger.js';
import { createInfluxdbSink, type MetricsSinkOptions } from './metrics-sink.js';
import { NopMonitor } from './nop-monitor.js';
import type { Monitor } from './types.js';

export { MetricsSink, createInfluxdbSink } from './metrics-sink.js';
export type { MetricsSinkOptions } from './metrics-sink.js';

export { ConnectivityProbe, DEFAULT_PROBE_INTERVAL_MS } from './connectivity-probe.js';
export type {
  ConnectivityState,
  ConnectivityStatus,
  ConnectivityProbeOptions,
} from './connectivity-probe.js';

export { InfluxBackend, createInfluxBackend, DEFAULT_PING_TIMEOUT_MS } from './influx-backend.js';
export type { InfluxClient } from './influx-backend.js';

export { parseBackendConfig, describeTarget } from './backend-config.js';
export type { BackendConfig } from './backend-config.js';

export { NopMonitor } from './nop-monitor.js';

export { createMeasurementPoint } from './types.js';
export type {
  Monitor,
  MetricsBackend,
  MeasurementPoint,
  Tags,
  Fields,
  FieldValue,
} from './types.js';

/**
 * InfluxDB sink when a URL is configured, otherwise a monitor that drops
 * everything
 */
export function createMonitor(
  config: TelemetryConfig,
  logger: LevelLogger,
  options: Omit<MetricsSinkOptions, 'probeIntervalMs'> = {},
): Monitor {
  if (config.influxdbUrl === undefined) {
    logger.info().log({ msg: 'no influxdb url configured, metrics disabled' });
    return new NopMonitor();
  }

  return createInfluxdbSink(config.influxdbUrl, logger, {
    ...options,
    probeIntervalMs: config.probeIntervalMs,
  });
}
