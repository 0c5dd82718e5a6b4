import type { Readable } from 'node:stream';
import type { Logger } from '@series-import/shared';
import type { ImportContext } from '../context/importContext';
import type { ImportAction, ImportFormat } from '../types';

export type AdapterSettings = {
  database: string;
  retentionPolicy: string;
  measurement: string;
  tags: string[];
  fields: string[];
  timeField: string;
  timeMultiplier: bigint;
  logger: Logger;
  now?: () => bigint;
};

/**
 * Reads one input format. `read` yields the format's native units in order;
 * `process` turns a unit into the action the importer carries out.
 */
export interface FormatAdapter<Unit> {
  readonly format: ImportFormat;
  read(stream: Readable): AsyncIterable<Unit>;
  process(unit: Unit, context: ImportContext): ImportAction;
}
