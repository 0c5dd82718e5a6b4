import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { parser } from 'stream-json/Parser';
import { pick } from 'stream-json/filters/Pick';
import { streamArray } from 'stream-json/streamers/StreamArray';
import { z } from 'zod';
import { RecordDecodeError, toError } from '../errors';
import { escapeKey } from '../lineProtocol/encoder';
import { parseLine, type LineProtocolOptions } from '../lineProtocol/tokenizer';

export type JsonUnit = { kind: 'schema' } | { kind: 'record'; value: unknown };

const arrayItemSchema = z.object({ key: z.number(), value: z.unknown() });

function decodeError(err: unknown): RecordDecodeError {
  return err instanceof RecordDecodeError ? err : new RecordDecodeError(`invalid json document: ${toError(err).message}`);
}

/**
 * Streams the elements of the first member named `key` holding an array,
 * searched depth first in document order. Elements are decoded one at a time;
 * the schema unit precedes them once the array is found.
 */
export async function* readJsonUnits(stream: Readable, key: string): AsyncIterable<JsonUnit> {
  let found = false;
  const records = streamArray();
  const finished = pipeline(
    stream,
    parser(),
    pick({
      filter: (stack, token) => {
        if (found || token.name !== 'startArray' || stack[stack.length - 1] !== key) {
          return false;
        }
        found = true;
        return true;
      }
    }),
    records
  ).then(
    () => null,
    (err: unknown) => toError(err)
  );

  let yielded = false;
  try {
    try {
      for await (const item of records) {
        const parsed = arrayItemSchema.safeParse(item);
        if (!parsed.success) {
          throw new RecordDecodeError('unexpected array element from json stream');
        }
        if (!yielded) {
          yielded = true;
          yield { kind: 'schema' };
        }
        yield { kind: 'record', value: parsed.data.value };
      }
    } catch (err) {
      throw decodeError(err);
    }

    const failure = await finished;
    if (failure) {
      throw decodeError(failure);
    }
    if (found && !yielded) {
      yield { kind: 'schema' };
    }
  } finally {
    // stops the parser when the consumer leaves early
    records.destroy();
  }
}

/** Parses rendered lines before they are buffered; a malformed record fails on its own. */
export function validateRenderedLines(lines: readonly string[], options: LineProtocolOptions): void {
  for (const line of lines) {
    parseLine(line, options);
  }
}

export function formatSeriesKey(measurement: string, tags: Iterable<[string, string]>): string {
  let key = escapeKey(measurement);
  for (const [name, value] of tags) {
    if (value !== '') {
      key += `,${escapeKey(name)}=${escapeKey(value)}`;
    }
  }
  return key;
}
