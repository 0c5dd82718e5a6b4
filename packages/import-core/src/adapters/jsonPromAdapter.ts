import type { Readable } from 'node:stream';
import { z } from 'zod';
import { DEFAULT_PROM_FIELD, PROM_RESULT_KEY } from '../constants';
import type { ImportContext } from '../context/importContext';
import { RecordDecodeError, STRUCTURED_DATABASE_HINT } from '../errors';
import { escapeKey } from '../lineProtocol/encoder';
import { NO_ACTION, type ImportAction } from '../types';
import { decodeScalar, formatFieldValue, formatFloat, isFloatLiteral, scaleDecimal } from '../values';
import { formatSeriesKey, readJsonUnits, validateRenderedLines, type JsonUnit } from './jsonDocument';
import type { AdapterSettings, FormatAdapter } from './types';

const NANOS_PER_SECOND = 1_000_000_000n;

const sampleSchema = z.tuple([z.number(), z.unknown()]);

const promRecordSchema = z.object({
  metric: z.record(z.string()).default({}),
  values: z.array(sampleSchema).optional(),
  value: sampleSchema.optional()
});

export type PromRecord = z.infer<typeof promRecordSchema>;

function formatSampleValue(value: unknown): string {
  if (typeof value === 'string' && isFloatLiteral(value)) {
    return value;
  }
  return formatFieldValue(decodeScalar(value));
}

export class JsonPromAdapter implements FormatAdapter<JsonUnit> {
  readonly format = 'jsonp';

  constructor(private readonly settings: AdapterSettings) {}

  async *read(stream: Readable): AsyncIterable<JsonUnit> {
    let units = 0;
    for await (const unit of readJsonUnits(stream, PROM_RESULT_KEY)) {
      units += 1;
      yield unit;
    }
    if (units === 0) {
      this.settings.logger.warn({ key: PROM_RESULT_KEY }, 'no result array found in json document');
    }
  }

  process(unit: JsonUnit, context: ImportContext): ImportAction {
    if (unit.kind === 'schema') {
      context.beginSchema({
        database: this.settings.database,
        retentionPolicy: this.settings.retentionPolicy,
        measurement: this.settings.measurement,
        tagMap: this.settings.tags.map((name, pos) => ({ name, pos })),
        fieldMap: [{ name: this.settings.fields[0] ?? DEFAULT_PROM_FIELD, pos: 0 }]
      });
      if (this.settings.database === '') {
        return NO_ACTION;
      }
      return { kind: 'query', command: `CREATE DATABASE ${this.settings.database}` };
    }

    const parsed = promRecordSchema.safeParse(unit.value);
    if (!parsed.success) {
      throw new RecordDecodeError(`invalid result record: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }
    const target = context.requireTarget(STRUCTURED_DATABASE_HINT);
    const measurement = context.requireMeasurement();
    const lines = this.renderLines(parsed.data, context, measurement);
    validateRenderedLines(lines, { timeMultiplier: this.settings.timeMultiplier, now: this.settings.now });
    return lines.length > 0 ? { kind: 'enqueueLines', target, lines } : NO_ACTION;
  }

  renderLines(record: PromRecord, context: ImportContext, measurement: string): string[] {
    const labels: [string, string][] =
      context.tagMap.length > 0
        ? context.tagMap.map(({ name }) => [name, record.metric[name] ?? ''])
        : Object.entries(record.metric);
    const seriesKey = formatSeriesKey(measurement, labels);
    const fieldName = escapeKey(context.fieldMap[0]?.name ?? DEFAULT_PROM_FIELD);
    const samples = record.values ?? (record.value ? [record.value] : []);

    return samples.map(([seconds, value]) => {
      const timestamp = this.toPrecision(seconds);
      return `${seriesKey} ${fieldName}=${formatSampleValue(value)} ${timestamp}`;
    });
  }

  /** Sample timestamps are Unix seconds; output follows the configured precision. */
  private toPrecision(seconds: number): string {
    const nanos = scaleDecimal(formatFloat(seconds), NANOS_PER_SECOND);
    if (nanos === null) {
      throw new RecordDecodeError(`invalid sample timestamp: ${seconds}`);
    }
    return (nanos / this.settings.timeMultiplier).toString();
  }
}
