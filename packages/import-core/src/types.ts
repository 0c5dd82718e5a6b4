export type FieldValue =
  | { type: 'string'; value: string }
  | { type: 'float'; value: number }
  | { type: 'integer'; value: bigint }
  | { type: 'boolean'; value: boolean };

export type FieldValueType = FieldValue['type'];

export interface Point {
  readonly measurement: string;
  readonly tags: Readonly<Record<string, string>>;
  readonly fields: Readonly<Record<string, FieldValue>>;
  /** Nanoseconds since the Unix epoch. */
  readonly timestamp: bigint;
}

export interface FieldPos {
  name: string;
  pos: number;
}

export type ImportFormat = 'line_protocol' | 'csv' | 'jsoni' | 'jsonp';

export type Precision = 's' | 'ms' | 'us' | 'ns' | '';

export type ImportPhase = 'ddl' | 'dml';

export interface WriteTarget {
  database: string;
  retentionPolicy: string;
}

/**
 * Outcome of processing one input unit. The importer interprets the action;
 * adapters and the context never perform I/O themselves.
 */
export type ImportAction =
  | { kind: 'none' }
  | { kind: 'query'; command: string }
  | { kind: 'enqueueLines'; target: WriteTarget; lines: string[] }
  | { kind: 'enqueuePoints'; target: WriteTarget; points: Point[] };

export const NO_ACTION: ImportAction = Object.freeze({ kind: 'none' });
