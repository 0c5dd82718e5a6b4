import type { Readable } from 'node:stream';
import { z } from 'zod';
import { DEFAULT_TIME_FIELD, INFLUX_SERIES_KEY } from '../constants';
import type { ImportContext } from '../context/importContext';
import { RecordDecodeError, STRUCTURED_DATABASE_HINT } from '../errors';
import { escapeKey } from '../lineProtocol/encoder';
import { NO_ACTION, type ImportAction } from '../types';
import { decodeScalar, formatFieldValue, formatTimestampValue } from '../values';
import { formatSeriesKey, readJsonUnits, validateRenderedLines, type JsonUnit } from './jsonDocument';
import type { AdapterSettings, FormatAdapter } from './types';

const seriesRecordSchema = z.object({
  name: z.string().min(1),
  tags: z.record(z.string()).optional(),
  columns: z.array(z.string()),
  values: z.array(z.array(z.unknown())).default([])
});

export type SeriesRecord = z.infer<typeof seriesRecordSchema>;

export class JsonInfluxAdapter implements FormatAdapter<JsonUnit> {
  readonly format = 'jsoni';

  constructor(private readonly settings: AdapterSettings) {}

  async *read(stream: Readable): AsyncIterable<JsonUnit> {
    let units = 0;
    for await (const unit of readJsonUnits(stream, INFLUX_SERIES_KEY)) {
      units += 1;
      yield unit;
    }
    if (units === 0) {
      this.settings.logger.warn({ key: INFLUX_SERIES_KEY }, 'no series array found in json document');
    }
  }

  process(unit: JsonUnit, context: ImportContext): ImportAction {
    if (unit.kind === 'schema') {
      context.beginSchema({
        database: this.settings.database,
        retentionPolicy: this.settings.retentionPolicy,
        measurement: this.settings.measurement
      });
      if (this.settings.database === '') {
        return NO_ACTION;
      }
      return { kind: 'query', command: `CREATE DATABASE ${this.settings.database}` };
    }

    const parsed = seriesRecordSchema.safeParse(unit.value);
    if (!parsed.success) {
      throw new RecordDecodeError(`invalid series record: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }
    const target = context.requireTarget(STRUCTURED_DATABASE_HINT);
    const lines = this.renderLines(parsed.data);
    validateRenderedLines(lines, { timeMultiplier: this.settings.timeMultiplier, now: this.settings.now });
    return lines.length > 0 ? { kind: 'enqueueLines', target, lines } : NO_ACTION;
  }

  renderLines(record: SeriesRecord): string[] {
    const seriesKey = formatSeriesKey(record.name, Object.entries(record.tags ?? {}));
    const timeIndex = record.columns.indexOf(DEFAULT_TIME_FIELD);
    const fieldColumns = record.columns
      .map((name, pos) => ({ name, pos }))
      .filter((column) => column.pos !== timeIndex);

    const lines: string[] = [];
    for (const row of record.values) {
      const fields = fieldColumns
        .filter(({ pos }) => pos < row.length)
        .map(({ name, pos }) => `${escapeKey(name)}=${formatFieldValue(decodeScalar(row[pos]))}`);
      if (fields.length === 0) {
        continue;
      }
      const timestamp =
        timeIndex >= 0 && timeIndex < row.length
          ? formatTimestampValue(decodeScalar(row[timeIndex]), this.settings.timeMultiplier)
          : '';
      lines.push(timestamp === '' ? `${seriesKey} ${fields.join(',')}` : `${seriesKey} ${fields.join(',')} ${timestamp}`);
    }
    return lines;
  }
}
