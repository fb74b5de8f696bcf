/**
 * InfluxDB 1.x backend over the `influx` HTTP client
 */

import { InfluxDB, type IPoint, type IWriteOptions } from 'influx';
import { Errors } from '../shared/errors.js';
import type { BackendConfig } from './backend-config.js';
import type { MeasurementPoint, MetricsBackend } from './types.js';

export const DEFAULT_PING_TIMEOUT_MS = 5000;

/** The part of the influx client the backend relies on */
export interface InfluxClient {
  writePoints(points: IPoint[], options?: IWriteOptions): Promise<void>;
  ping(timeout: number): Promise<ReadonlyArray<{ readonly online: boolean }>>;
}

export class InfluxBackend implements MetricsBackend {
  // Each call is an independent HTTP request
  readonly concurrencySafe = true;

  constructor(
    private readonly client: InfluxClient,
    private readonly pingTimeoutMs: number = DEFAULT_PING_TIMEOUT_MS,
  ) {}

  async write(database: string, point: MeasurementPoint): Promise<void> {
    await this.client.writePoints(
      [
        {
          measurement: point.measurement,
          tags: { ...point.tags },
          fields: { ...point.fields },
          timestamp: point.timestamp,
        },
      ],
      { database },
    );
  }

  async ping(): Promise<void> {
    const hosts = await this.client.ping(this.pingTimeoutMs);
    if (!hosts.some((host) => host.online)) {
      throw Errors.backendUnreachable(hosts.length);
    }
  }

  async close(): Promise<void> {
    // nothing pooled beyond Node's global agent
  }
}

/**
 * Bind an influx client to the parsed target
 */
export function createInfluxBackend(
  target: BackendConfig,
  pingTimeoutMs: number = DEFAULT_PING_TIMEOUT_MS,
): InfluxBackend {
  if (target.scheme !== 'http' && target.scheme !== 'https') {
    throw Errors.unsupportedScheme(target.scheme);
  }

  const client = new InfluxDB({
    host: target.hostname,
    port: target.port ?? (target.scheme === 'https' ? 443 : 80),
    protocol: target.scheme,
    username: target.username,
    password: target.password,
    database: target.database,
  });

  return new InfluxBackend(client, pingTimeoutMs);
}
