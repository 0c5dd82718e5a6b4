import { DEFAULT_RETENTION_POLICY } from '../constants';
import { DatabaseRequiredError, ImportConfigurationError } from '../errors';
import type { FieldPos, ImportPhase, WriteTarget } from '../types';

export type ImportContextSeed = {
  database?: string;
  retentionPolicy?: string;
  measurement?: string;
};

export type ImportSchema = {
  database: string;
  retentionPolicy: string;
  measurement: string;
  tagMap?: FieldPos[];
  fieldMap?: FieldPos[];
  timeField?: FieldPos | null;
};

/**
 * Phase and schema of one import run. Directive lines and structured headers
 * mutate it; data units read the current target from it. Never performs I/O.
 */
export class ImportContext {
  phase: ImportPhase = 'ddl';
  database: string;
  retentionPolicy: string;
  measurement: string;
  tagMap: FieldPos[] = [];
  fieldMap: FieldPos[] = [];
  timeField: FieldPos | null = null;

  constructor(seed: ImportContextSeed = {}) {
    this.database = seed.database ?? '';
    this.retentionPolicy = seed.retentionPolicy ?? '';
    this.measurement = seed.measurement ?? '';
  }

  beginDdl(): void {
    this.phase = 'ddl';
  }

  beginDml(): void {
    this.phase = 'dml';
    this.retentionPolicy = DEFAULT_RETENTION_POLICY;
  }

  useDatabase(name: string): void {
    this.database = name.trim();
  }

  useRetentionPolicy(name: string): void {
    this.retentionPolicy = name.trim();
  }

  /** Header of a structured format: switches to DML with the given schema. */
  beginSchema(schema: ImportSchema): void {
    this.phase = 'dml';
    this.database = schema.database;
    this.retentionPolicy = schema.retentionPolicy;
    this.measurement = schema.measurement;
    this.tagMap = schema.tagMap ?? [];
    this.fieldMap = schema.fieldMap ?? [];
    this.timeField = schema.timeField ?? null;
  }

  get schemaReady(): boolean {
    return this.phase === 'dml';
  }

  requireTarget(hint?: string): WriteTarget {
    if (this.database === '') {
      throw new DatabaseRequiredError(hint);
    }
    return {
      database: this.database,
      retentionPolicy: this.retentionPolicy === '' ? DEFAULT_RETENTION_POLICY : this.retentionPolicy
    };
  }

  requireMeasurement(): string {
    if (this.measurement === '') {
      throw new ImportConfigurationError('measurement is required');
    }
    return this.measurement;
  }
}
