import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import {
  DIRECTIVE_DATABASE,
  DIRECTIVE_DDL,
  DIRECTIVE_DML,
  DIRECTIVE_RETENTION_POLICY
} from '../constants';
import type { ImportContext } from '../context/importContext';
import { parseLine } from '../lineProtocol/tokenizer';
import { NO_ACTION, type ImportAction } from '../types';
import type { AdapterSettings, FormatAdapter } from './types';

export class LineProtocolAdapter implements FormatAdapter<string> {
  readonly format = 'line_protocol';

  constructor(private readonly settings: AdapterSettings) {}

  async *read(stream: Readable): AsyncIterable<string> {
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      lines.close();
    }
  }

  process(unit: string, context: ImportContext): ImportAction {
    const line = unit.trim();

    if (line.startsWith(DIRECTIVE_DDL)) {
      context.beginDdl();
      return NO_ACTION;
    }
    if (line.startsWith(DIRECTIVE_DML)) {
      context.beginDml();
      return NO_ACTION;
    }
    if (line.startsWith(DIRECTIVE_DATABASE)) {
      context.useDatabase(line.slice(DIRECTIVE_DATABASE.length));
      return NO_ACTION;
    }
    if (line.startsWith(DIRECTIVE_RETENTION_POLICY)) {
      context.useRetentionPolicy(line.slice(DIRECTIVE_RETENTION_POLICY.length));
      return NO_ACTION;
    }
    if (line === '' || line.startsWith('#')) {
      return NO_ACTION;
    }

    if (context.phase === 'ddl') {
      return { kind: 'query', command: line };
    }

    const target = context.requireTarget();
    // rejects malformed lines before they reach a batch
    parseLine(line, { timeMultiplier: this.settings.timeMultiplier, now: this.settings.now });
    return { kind: 'enqueueLines', target, lines: [line] };
  }
}
