/**
 * Background reachability check for a metrics backend
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { toError } from '../shared/errors.js';
import type { LevelLogger } from '../logging/level-logger.js';
import type { MetricsBackend } from './types.js';

export const DEFAULT_PROBE_INTERVAL_MS = 5 * 60 * 1000;

export type ConnectivityStatus = 'unknown' | 'reachable' | 'unreachable';

export interface ConnectivityState {
  readonly status: ConnectivityStatus;
  readonly error?: Error;
  readonly checkedAt?: Date;
  readonly consecutiveFailures: number;
}

export interface ConnectivityProbeOptions {
  intervalMs?: number;
  /** Aborting stops the probe, same as stop() */
  signal?: AbortSignal;
}

/**
 * Pings the backend right away and then on every interval until stopped.
 * A failed ping is logged at warn and never ends the loop; a successful
 * one is silent.
 */
export class ConnectivityProbe {
  private readonly controller = new AbortController();
  private readonly intervalMs: number;
  private current: ConnectivityState = { status: 'unknown', consecutiveFailures: 0 };
  private loop?: Promise<void>;

  constructor(
    private readonly backend: Pick<MetricsBackend, 'ping'>,
    private readonly logger: LevelLogger,
    options: ConnectivityProbeOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_PROBE_INTERVAL_MS;

    const { signal } = options;
    if (signal?.aborted) {
      this.controller.abort();
    } else {
      signal?.addEventListener('abort', () => this.controller.abort(), { once: true });
    }
  }

  get state(): ConnectivityState {
    return this.current;
  }

  get running(): boolean {
    return this.loop !== undefined && !this.controller.signal.aborted;
  }

  start(): void {
    if (this.loop || this.controller.signal.aborted) {
      return;
    }
    this.loop = this.run(this.controller.signal).catch((error: unknown) => {
      this.logger.error().log({
        err: toError(error),
        during: 'ConnectivityProbe.run',
        msg: `connectivity probe stopped: ${toError(error).message}`,
      });
    });
  }

  async stop(): Promise<void> {
    this.controller.abort();
    await this.loop;
  }

  /**
   * One reachability check. Never throws.
   */
  async check(): Promise<ConnectivityState> {
    try {
      await this.backend.ping();
      this.current = { status: 'reachable', checkedAt: new Date(), consecutiveFailures: 0 };
    } catch (error) {
      const err = toError(error);
      this.current = {
        status: 'unreachable',
        error: err,
        checkedAt: new Date(),
        consecutiveFailures: this.current.consecutiveFailures + 1,
      };
      this.logger.warn().log({
        err,
        during: 'influxdb.ping',
        msg: `couldn't ping influxdb: ${err.message}`,
      });
    }
    return this.current;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.check();
      try {
        // unref'd: the probe alone never keeps the process alive
        await sleep(this.intervalMs, undefined, { signal, ref: false });
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
    }
  }
}
