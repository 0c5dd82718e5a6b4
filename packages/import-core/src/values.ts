import type { FieldValue } from './types';

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;

const INTEGER_LITERAL = /^[+-]?\d+[iu]$/;
const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DECIMAL_LITERAL = /^([+-]?)(\d+)(?:\.(\d*))?$/;
const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;
const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:(Z)|([+-])(\d{2}):(\d{2}))$/;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

const SPECIAL_FLOATS = new Map<string, number>([
  ['NaN', Number.NaN],
  ['Inf', Number.POSITIVE_INFINITY],
  ['+Inf', Number.POSITIVE_INFINITY],
  ['-Inf', Number.NEGATIVE_INFINITY]
]);

const TRUE_LITERALS = new Set(['t', 'T', 'true', 'True', 'TRUE']);
const FALSE_LITERALS = new Set(['f', 'F', 'false', 'False', 'FALSE']);

/**
 * Shortest round-trip decimal representation of a float, never in exponent
 * notation (`1e21` renders as `1000000000000000000000`).
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? '+Inf' : '-Inf';
  }
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }
  const [, sign, lead, fraction = '', exponentText] = match;
  const digits = `${lead}${fraction}`;
  const pointPos = 1 + Number.parseInt(exponentText ?? '0', 10);
  if (pointPos <= 0) {
    return `${sign}0.${'0'.repeat(-pointPos)}${digits}`;
  }
  if (pointPos >= digits.length) {
    return `${sign}${digits}${'0'.repeat(pointPos - digits.length)}`;
  }
  return `${sign}${digits.slice(0, pointPos)}.${digits.slice(pointPos)}`;
}

export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

/** Whether an integer field value fits the width its literal suffix declares. */
export function integerLiteralInRange(raw: string, value: bigint): boolean {
  return raw.endsWith('u') ? value >= 0n && value <= UINT64_MAX : isInt64(value);
}

/** Types a raw protocol field value. */
export function inferFieldValue(raw: string, quoted: boolean): FieldValue {
  if (quoted) {
    return { type: 'string', value: raw };
  }
  if (INTEGER_LITERAL.test(raw)) {
    return { type: 'integer', value: BigInt(raw.slice(0, -1)) };
  }
  if (TRUE_LITERALS.has(raw)) {
    return { type: 'boolean', value: true };
  }
  if (FALSE_LITERALS.has(raw)) {
    return { type: 'boolean', value: false };
  }
  if (FLOAT_LITERAL.test(raw)) {
    return { type: 'float', value: Number(raw) };
  }
  const special = SPECIAL_FLOATS.get(raw);
  if (special !== undefined) {
    return { type: 'float', value: special };
  }
  return { type: 'string', value: raw };
}

/** Converts a decoded JSON value into a field value; unsupported values are absent. */
export function decodeScalar(value: unknown): FieldValue | null {
  switch (typeof value) {
    case 'string':
      return { type: 'string', value };
    case 'boolean':
      return { type: 'boolean', value };
    case 'bigint':
      return { type: 'integer', value };
    case 'number':
      if (Number.isSafeInteger(value)) {
        return { type: 'integer', value: BigInt(value) };
      }
      return Number.isFinite(value) ? { type: 'float', value } : null;
    default:
      return null;
  }
}

export function quoteString(value: string): string {
  return `"${value.replace(/[\\"]/g, (char) => `\\${char}`)}"`;
}

/** Canonical text of a field value as written into a protocol line. */
export function formatFieldValue(value: FieldValue | null): string {
  if (!value) {
    return '""';
  }
  switch (value.type) {
    case 'float':
      return formatFloat(value.value);
    case 'integer':
      return value.value.toString();
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'string':
      return quoteString(value.value);
  }
}

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month - 1] ?? 0;
}

/** Strict RFC3339 parser returning Unix nanoseconds, or null when the text does not conform. */
export function parseRfc3339(text: string): bigint | null {
  const match = RFC3339.exec(text);
  if (!match) {
    return null;
  }
  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, zulu, offsetSign, offsetHours, offsetMinutes] =
    match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  let offsetSeconds = 0;
  if (!zulu) {
    const hours = Number(offsetHours);
    const minutes = Number(offsetMinutes);
    if (hours > 23 || minutes > 59) {
      return null;
    }
    offsetSeconds = (hours * 3600 + minutes * 60) * (offsetSign === '-' ? -1 : 1);
  }

  const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second));
  date.setUTCFullYear(year);
  const fractionNanos = fraction ? BigInt(fraction.slice(0, 9).padEnd(9, '0')) : 0n;
  return (
    BigInt(date.getTime()) * NANOS_PER_MILLI + fractionNanos - BigInt(offsetSeconds) * NANOS_PER_SECOND
  );
}

/**
 * Canonical text of a timestamp value. Unlike field values, an unparseable
 * timestamp yields an empty string so the record falls back to server time.
 */
export function formatTimestampValue(value: FieldValue | null, multiplier: bigint): string {
  if (!value) {
    return '';
  }
  switch (value.type) {
    case 'float':
      return formatFloat(value.value);
    case 'integer':
      return value.value.toString();
    case 'string': {
      const nanos = parseRfc3339(value.value);
      return nanos === null ? '' : (nanos / multiplier).toString();
    }
    default:
      return '';
  }
}

/** Scales a decimal string by the multiplier without going through floating point. */
export function scaleDecimal(text: string, multiplier: bigint): bigint | null {
  const match = DECIMAL_LITERAL.exec(text);
  if (!match) {
    return null;
  }
  const [, sign, whole = '0', fraction = ''] = match;
  let scaled = BigInt(whole) * multiplier;
  if (fraction.length > 0) {
    scaled += (BigInt(fraction) * multiplier) / 10n ** BigInt(fraction.length);
  }
  return sign === '-' ? -scaled : scaled;
}

/**
 * Resolves a structured-format time cell to Unix nanoseconds: a number in the
 * configured precision, or an RFC3339 instant. Returns null when neither applies.
 */
export function scaleTimestamp(text: string, multiplier: bigint): bigint | null {
  const trimmed = text.trim();
  if (trimmed === '') {
    return null;
  }
  const decimal = scaleDecimal(trimmed, multiplier);
  if (decimal !== null) {
    return decimal;
  }
  if (FLOAT_LITERAL.test(trimmed)) {
    const numeric = Number(trimmed);
    if (Number.isFinite(numeric)) {
      return scaleDecimal(formatFloat(numeric), multiplier);
    }
  }
  return parseRfc3339(trimmed);
}

export function currentTimeNanos(): bigint {
  return BigInt(Date.now()) * NANOS_PER_MILLI;
}

/** Decimal float text, or one of `NaN`, `Inf`, `+Inf`, `-Inf`. */
export function isFloatLiteral(text: string): boolean {
  return FLOAT_LITERAL.test(text) || SPECIAL_FLOATS.has(text);
}
