/**
 * Monitoring types - measurement points, backends and the Monitor contract
 */

export type Tags = Readonly<Record<string, string>>;

export type FieldValue = number | string | boolean;

export type Fields = Readonly<Record<string, FieldValue>>;

export interface MeasurementPoint {
  readonly measurement: string;
  readonly value: number;
  readonly tags: Tags;
  /** Always contains `value` */
  readonly fields: Fields;
  readonly timestamp: Date;
}

/**
 * A time-series store the sink can write to.
 */
export interface MetricsBackend {
  /**
   * Whether write() may be called again before a previous call settled.
   * When false the sink serializes writes itself.
   */
  readonly concurrencySafe: boolean;
  write(database: string, point: MeasurementPoint): Promise<void>;
  /** Resolves when the backend answered, rejects otherwise */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Fire-and-forget metrics interface. Returned promises never reject.
 */
export interface Monitor {
  insertRecord(
    measurement: string,
    value: number,
    tags?: Tags,
    fields?: Fields,
    at?: Date,
  ): Promise<void>;
  count(measurement: string, value: number, tags?: Tags, fields?: Fields): Promise<void>;
  countError(measurement: string, value: number, err: Error): Promise<void>;
  countSimple(measurement: string, value: number): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Build an immutable point from copies of the caller's maps
 */
export function createMeasurementPoint(
  measurement: string,
  value: number,
  tags: Tags = {},
  fields: Fields = {},
  at: Date = new Date(),
): MeasurementPoint {
  return Object.freeze({
    measurement,
    value,
    tags: Object.freeze({ ...tags }),
    fields: Object.freeze({ ...fields, value }),
    timestamp: new Date(at.getTime()),
  });
}
