import type { FieldValue, Point } from '../types';
import { formatFloat, quoteString } from '../values';

const KEY_SPECIAL_CHARS = /[\\,= "[\]]/g;

export function escapeKey(value: string): string {
  return value.replace(KEY_SPECIAL_CHARS, (char) => `\\${char}`);
}

export function encodeFieldValue(value: FieldValue): string {
  switch (value.type) {
    case 'float':
      return formatFloat(value.value);
    case 'integer':
      return `${value.value.toString()}i`;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'string':
      return quoteString(value.value);
  }
}

/** Renders a point as one protocol line with a nanosecond timestamp. */
export function formatPoint(point: Point): string {
  let line = escapeKey(point.measurement);
  for (const [key, value] of Object.entries(point.tags)) {
    line += `,${escapeKey(key)}=${escapeKey(value)}`;
  }
  const fields = Object.entries(point.fields).map(([key, value]) => `${escapeKey(key)}=${encodeFieldValue(value)}`);
  return `${line} ${fields.join(',')} ${point.timestamp.toString()}`;
}
