import { LineProtocolParseError } from './errors';
import type { FieldValue, Point } from './types';

export type PointInput = {
  measurement: string;
  tags?: Record<string, string>;
  fields: Record<string, FieldValue>;
  timestamp: bigint;
};

export function createPoint(input: PointInput, line: string | null = null): Point {
  if (input.measurement.length === 0) {
    throw new LineProtocolParseError('missing measurement', line);
  }
  if (Object.keys(input.fields).length === 0) {
    throw new LineProtocolParseError('no fields input', line);
  }
  return Object.freeze({
    measurement: input.measurement,
    tags: Object.freeze({ ...(input.tags ?? {}) }),
    fields: Object.freeze({ ...input.fields }),
    timestamp: input.timestamp
  });
}
