import type { Readable } from 'node:stream';
import { parse } from 'csv-parse';
import { z } from 'zod';
import type { ImportContext } from '../context/importContext';
import { ImportConfigurationError, STRUCTURED_DATABASE_HINT } from '../errors';
import { createPoint } from '../point';
import { NO_ACTION, type FieldPos, type FieldValue, type ImportAction } from '../types';
import { currentTimeNanos, scaleTimestamp } from '../values';
import type { AdapterSettings, FormatAdapter } from './types';

const csvRowSchema = z.array(z.string());

const BYTE_ORDER_MARK = '\ufeff';

function headerError(message: string): ImportConfigurationError {
  return new ImportConfigurationError(message, { fatal: true });
}

export class CsvAdapter implements FormatAdapter<string[]> {
  readonly format = 'csv';

  constructor(private readonly settings: AdapterSettings) {}

  async *read(stream: Readable): AsyncIterable<string[]> {
    const parser = parse({
      bom: true,
      comment: '#',
      comment_no_infix: true,
      relax_column_count: true,
      skip_empty_lines: true
    });
    stream.once('error', (err) => parser.destroy(err));
    stream.pipe(parser);
    for await (const record of parser) {
      yield csvRowSchema.parse(record);
    }
  }

  process(unit: string[], context: ImportContext): ImportAction {
    if (unit.length === 0) {
      return NO_ACTION;
    }
    if (!context.schemaReady) {
      return this.processHeader(unit, context);
    }
    return this.processRow(unit, context);
  }

  private processHeader(header: string[], context: ImportContext): ImportAction {
    const { tags, fields, timeField, logger } = this.settings;
    const tagMap = new Map<string, FieldPos>();
    const fieldMap = new Map<string, FieldPos>();
    let timePos: FieldPos | null = null;

    for (const [index, cell] of header.entries()) {
      const name = index === 0 && cell.startsWith(BYTE_ORDER_MARK) ? cell.slice(1) : cell;
      if (tags.includes(name)) {
        tagMap.set(name, { name, pos: index });
      } else if (fields.includes(name)) {
        fieldMap.set(name, { name, pos: index });
      } else if (name === timeField) {
        timePos = { name, pos: index };
      } else if (fields.length === 0) {
        fieldMap.set(name, { name, pos: index });
      } else {
        logger.info({ column: name }, 'ignore column name');
      }
    }

    for (const name of fields) {
      if (tags.includes(name)) {
        throw headerError(`${name} is in both tags and fields`);
      }
      if (!fieldMap.has(name)) {
        throw headerError(`field name (${name}) not in csv header`);
      }
    }
    for (const name of tags) {
      if (!tagMap.has(name)) {
        throw headerError(`tag name (${name}) not in csv header`);
      }
    }
    if (!timePos) {
      throw headerError(`time name not in csv header ${timeField}`);
    }
    if (fieldMap.size === 0) {
      throw headerError('field is required');
    }

    context.beginSchema({
      database: this.settings.database,
      retentionPolicy: this.settings.retentionPolicy,
      measurement: this.settings.measurement,
      tagMap: Array.from(tagMap.values()),
      fieldMap: Array.from(fieldMap.values()),
      timeField: timePos
    });
    logger.info({ tags: tagMap.size, fields: fieldMap.size }, 'parse header success');

    if (this.settings.database === '') {
      return NO_ACTION;
    }
    return { kind: 'query', command: `CREATE DATABASE ${this.settings.database}` };
  }

  private processRow(row: string[], context: ImportContext): ImportAction {
    const target = context.requireTarget(STRUCTURED_DATABASE_HINT);
    const measurement = context.requireMeasurement();

    const tags: Record<string, string> = {};
    for (const { name, pos } of context.tagMap) {
      const value = row[pos];
      if (value !== undefined && value !== '') {
        tags[name] = value;
      }
    }

    // cells stay strings so every row of a column shares one field type
    const fieldValues: Record<string, FieldValue> = {};
    for (const { name, pos } of context.fieldMap) {
      const value = row[pos]?.trim();
      if (value !== undefined && value !== '') {
        fieldValues[name] = { type: 'string', value };
      }
    }

    const timeCell = context.timeField ? row[context.timeField.pos] : undefined;
    const timestamp =
      (timeCell === undefined ? null : scaleTimestamp(timeCell, this.settings.timeMultiplier)) ??
      (this.settings.now ?? currentTimeNanos)();

    const point = createPoint({ measurement, tags, fields: fieldValues, timestamp }, row.join(','));
    return { kind: 'enqueuePoints', target, points: [point] };
  }
}
