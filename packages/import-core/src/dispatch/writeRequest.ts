import { WriteRequestBuildError } from '../errors';
import type { FieldValue, FieldValueType } from '../types';

export type ColumnKind = 'tag' | FieldValueType;

export interface ColumnSchema {
  name: string;
  kind: ColumnKind;
}

export interface RecordLine {
  measurement: string;
  tags: Record<string, string>;
  fields: Record<string, FieldValue>;
  timestamp: bigint;
}

export interface WriteRecord {
  measurement: string;
  minTime: bigint;
  maxTime: bigint;
  schema: ColumnSchema[];
  lines: RecordLine[];
}

export interface WriteRequest {
  database: string;
  retentionPolicy: string;
  username: string;
  password: string;
  records: WriteRecord[];
}

export class LineBuilder {
  private readonly tags: Record<string, string> = {};
  private readonly fields: Record<string, FieldValue> = {};

  constructor(private readonly measurement: string) {}

  addTag(key: string, value: string): this {
    this.tags[key] = value;
    return this;
  }

  addField(key: string, value: FieldValue): this {
    this.fields[key] = value;
    return this;
  }

  build(timestamp: bigint): RecordLine {
    return {
      measurement: this.measurement,
      tags: { ...this.tags },
      fields: { ...this.fields },
      timestamp
    };
  }
}

export class RecordBuilder {
  constructor(readonly measurement: string) {
    if (measurement === '') {
      throw new WriteRequestBuildError('measurement name is required');
    }
  }

  newLine(): LineBuilder {
    return new LineBuilder(this.measurement);
  }
}

function buildRecord(measurement: string, lines: RecordLine[]): WriteRecord {
  const columns = new Map<string, ColumnKind>();
  const claim = (name: string, kind: ColumnKind) => {
    const existing = columns.get(name);
    if (existing !== undefined && existing !== kind) {
      throw new WriteRequestBuildError(
        `column ${name} of ${measurement} has conflicting types: ${existing} and ${kind}`
      );
    }
    columns.set(name, kind);
  };

  let minTime = lines[0]?.timestamp ?? 0n;
  let maxTime = minTime;
  for (const line of lines) {
    for (const name of Object.keys(line.tags)) {
      claim(name, 'tag');
    }
    for (const [name, value] of Object.entries(line.fields)) {
      claim(name, value.type);
    }
    if (line.timestamp < minTime) {
      minTime = line.timestamp;
    }
    if (line.timestamp > maxTime) {
      maxTime = line.timestamp;
    }
  }

  return {
    measurement,
    minTime,
    maxTime,
    schema: Array.from(columns, ([name, kind]) => ({ name, kind })),
    lines
  };
}

/**
 * Accumulates record lines for one database and retention policy. `build`
 * groups them per measurement and resets the builder for reuse.
 */
export class WriteRequestBuilder {
  private username = '';
  private password = '';
  private pending: RecordLine[] = [];

  constructor(
    readonly database: string,
    readonly retentionPolicy: string
  ) {
    if (database === '') {
      throw new WriteRequestBuildError('database name is required');
    }
  }

  authenticate(username: string, password: string): this {
    this.username = username;
    this.password = password;
    return this;
  }

  addRecord(...lines: RecordLine[]): this {
    this.pending.push(...lines);
    return this;
  }

  build(): WriteRequest {
    const lines = this.pending;
    this.pending = [];
    if (lines.length === 0) {
      throw new WriteRequestBuildError('no records to write');
    }

    const byMeasurement = new Map<string, RecordLine[]>();
    for (const line of lines) {
      const group = byMeasurement.get(line.measurement);
      if (group) {
        group.push(line);
      } else {
        byMeasurement.set(line.measurement, [line]);
      }
    }

    return {
      database: this.database,
      retentionPolicy: this.retentionPolicy,
      username: this.username,
      password: this.password,
      records: Array.from(byMeasurement, ([measurement, group]) => buildRecord(measurement, group))
    };
  }
}
