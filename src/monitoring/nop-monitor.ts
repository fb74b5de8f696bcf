import type { Monitor } from './types.js';

/**
 * Monitor that drops every measurement, used when no backend is configured
 */
export class NopMonitor implements Monitor {
  async insertRecord(): Promise<void> {}

  async count(): Promise<void> {}

  async countError(): Promise<void> {}

  async countSimple(): Promise<void> {}

  async flush(): Promise<void> {}

  async close(): Promise<void> {}
}
