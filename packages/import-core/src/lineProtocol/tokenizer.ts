import { LineProtocolParseError } from '../errors';
import { createPoint } from '../point';
import type { FieldValue, Point } from '../types';
import { currentTimeNanos, inferFieldValue, integerLiteralInRange, isInt64 } from '../values';

export type TokenizerState = 'measurement' | 'tagKey' | 'tagValue' | 'fieldKey' | 'fieldValue' | 'timestamp';

type CharClass = 'comma' | 'equals' | 'space' | 'openBracket' | 'closeBracket' | 'other';

export type LineProtocolOptions = {
  /** Applied to captured timestamps; lines written at `ms` precision use 1_000_000n. */
  timeMultiplier?: bigint;
  now?: () => bigint;
};

const TIMESTAMP_PATTERN = /^[+-]?\d+$/;

function classify(char: string): CharClass {
  switch (char) {
    case ',':
      return 'comma';
    case '=':
      return 'equals';
    case ' ':
      return 'space';
    case '[':
      return 'openBracket';
    case ']':
      return 'closeBracket';
    default:
      return 'other';
  }
}

class LineScanner {
  private state: TokenizerState = 'measurement';
  private escape = false;
  private quoted = false;
  private bracket = false;
  private finished = false;

  private measurement = '';
  private key = '';
  private value = '';
  private valueQuoted = false;
  private timestamp = '';
  private readonly tags: Record<string, string> = {};
  private readonly fields: Record<string, FieldValue> = {};

  constructor(
    private readonly line: string,
    private readonly options: LineProtocolOptions
  ) {}

  scan(): Point {
    for (const char of this.line) {
      this.consume(char);
      if (this.finished) {
        break;
      }
    }
    if (this.key !== '') {
      this.commitPair();
    }
    return createPoint(
      {
        measurement: this.measurement,
        tags: this.tags,
        fields: this.fields,
        timestamp: this.resolveTimestamp()
      },
      this.line
    );
  }

  private consume(char: string): void {
    if (this.escape) {
      this.escape = false;
      this.append(char);
      return;
    }
    if (char === '\\') {
      this.escape = true;
      return;
    }
    if (char === '"') {
      this.quoted = !this.quoted;
      if (this.state === 'fieldValue') {
        this.valueQuoted = true;
      }
      return;
    }
    if (this.quoted) {
      this.append(char);
      return;
    }
    const charClass = classify(char);
    if (this.bracket && this.state === 'tagValue' && charClass === 'comma') {
      this.append(char);
      return;
    }
    this.transition(charClass, char);
  }

  private transition(charClass: CharClass, char: string): void {
    switch (charClass) {
      case 'comma':
        if (this.state === 'measurement') {
          this.state = 'tagKey';
        } else if (this.state === 'tagValue') {
          this.commitPair();
          this.state = 'tagKey';
        } else if (this.state === 'fieldValue') {
          this.commitPair();
          this.state = 'fieldKey';
        }
        return;
      case 'equals':
        if (this.state === 'tagKey') {
          this.state = 'tagValue';
        } else if (this.state === 'fieldKey') {
          this.state = 'fieldValue';
        }
        return;
      case 'space':
        if (this.key !== '') {
          this.commitPair();
        }
        switch (this.state) {
          case 'measurement':
          case 'tagKey':
          case 'tagValue':
            this.state = 'fieldKey';
            return;
          case 'fieldKey':
          case 'fieldValue':
            this.state = 'timestamp';
            return;
          case 'timestamp':
            this.finished = true;
            return;
        }
        return;
      case 'openBracket':
      case 'closeBracket':
        if (this.state !== 'tagValue') {
          throw new LineProtocolParseError(`invalid tag value token: '${char}'`, this.line);
        }
        this.bracket = charClass === 'openBracket';
        this.append(char);
        return;
      case 'other':
        this.append(char);
        return;
    }
  }

  private append(char: string): void {
    switch (this.state) {
      case 'measurement':
        this.measurement += char;
        return;
      case 'tagKey':
      case 'fieldKey':
        this.key += char;
        return;
      case 'tagValue':
      case 'fieldValue':
        this.value += char;
        return;
      case 'timestamp':
        this.timestamp += char;
        return;
    }
  }

  private commitPair(): void {
    if (this.state === 'tagKey' || this.state === 'tagValue') {
      this.tags[this.key] = this.value;
    } else if (this.state === 'fieldKey' || this.state === 'fieldValue') {
      const value = inferFieldValue(this.value, this.valueQuoted);
      if (value.type === 'integer' && !integerLiteralInRange(this.value, value.value)) {
        throw new LineProtocolParseError(`integer out of range: ${this.value}`, this.line);
      }
      this.fields[this.key] = value;
    }
    this.key = '';
    this.value = '';
    this.valueQuoted = false;
  }

  private resolveTimestamp(): bigint {
    if (this.timestamp === '') {
      return (this.options.now ?? currentTimeNanos)();
    }
    if (!TIMESTAMP_PATTERN.test(this.timestamp)) {
      throw new LineProtocolParseError(`invalid timestamp: ${this.timestamp}`, this.line);
    }
    const timestamp = BigInt(this.timestamp) * (this.options.timeMultiplier ?? 1n);
    if (!isInt64(timestamp)) {
      throw new LineProtocolParseError(`timestamp out of range: ${this.timestamp}`, this.line);
    }
    return timestamp;
  }
}

/**
 * Tokenizes a single trimmed line. Comment and directive lines yield null.
 */
export function parseLine(line: string, options: LineProtocolOptions = {}): Point | null {
  if (line.startsWith('#')) {
    return null;
  }
  return new LineScanner(line, options).scan();
}

export function* iterateLineProtocol(text: string, options: LineProtocolOptions = {}): Generator<Point> {
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '') {
      continue;
    }
    const point = parseLine(line, options);
    if (point) {
      yield point;
    }
  }
}

/** Parses every line of the text; the first malformed line aborts the whole parse. */
export function parseLineProtocol(text: string, options: LineProtocolOptions = {}): Point[] {
  return Array.from(iterateLineProtocol(text, options));
}

export class LineProtocolParser {
  constructor(
    private readonly text: string,
    private readonly options: LineProtocolOptions = {}
  ) {}

  parse(): Point[] {
    return parseLineProtocol(this.text, this.options);
  }

  [Symbol.iterator](): Iterator<Point> {
    return iterateLineProtocol(this.text, this.options);
  }
}
