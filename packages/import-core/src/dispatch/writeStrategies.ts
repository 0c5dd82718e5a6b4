import type { ColumnWriteClient, RequestOptions, RowWriteClient } from '../collaborators';
import { formatPoint } from '../lineProtocol/encoder';
import { parseLine } from '../lineProtocol/tokenizer';
import type { Point, Precision, WriteTarget } from '../types';
import type { WriteRequestBuilderRegistry } from './builderRegistry';
import { interpretWriteResponse } from './responseCodes';
import { RecordBuilder, type RecordLine } from './writeRequest';

export type WriteStrategyName = 'row' | 'column';

export interface WriteStrategy {
  readonly name: WriteStrategyName;
  writeLines(target: WriteTarget, lines: string[], options?: RequestOptions): Promise<void>;
  writePoints(target: WriteTarget, points: Point[], options?: RequestOptions): Promise<void>;
}

/** Sends protocol text verbatim; typed points are encoded at nanosecond precision. */
export class RowWriteStrategy implements WriteStrategy {
  readonly name = 'row';

  constructor(
    private readonly client: RowWriteClient,
    private readonly precision: Precision
  ) {}

  async writeLines(target: WriteTarget, lines: string[], options?: RequestOptions): Promise<void> {
    await this.client.write(target.database, target.retentionPolicy, lines.join('\n'), this.precision, options);
  }

  async writePoints(target: WriteTarget, points: Point[], options?: RequestOptions): Promise<void> {
    const text = points.map((point) => formatPoint(point)).join('\n');
    await this.client.write(target.database, target.retentionPolicy, text, 'ns', options);
  }
}

export type ColumnWriteStrategyOptions = {
  client: ColumnWriteClient;
  registry: WriteRequestBuilderRegistry;
  username: string;
  password: string;
  /** Precision of the protocol lines handed to `writeLines`. */
  timeMultiplier: bigint;
};

export class ColumnWriteStrategy implements WriteStrategy {
  readonly name = 'column';

  constructor(private readonly options: ColumnWriteStrategyOptions) {}

  async writeLines(target: WriteTarget, lines: string[], options?: RequestOptions): Promise<void> {
    const points: Point[] = [];
    for (const line of lines) {
      const point = parseLine(line, { timeMultiplier: this.options.timeMultiplier });
      if (point) {
        points.push(point);
      }
    }
    await this.writePoints(target, points, options);
  }

  async writePoints(target: WriteTarget, points: Point[], options?: RequestOptions): Promise<void> {
    const recordBuilders = new Map<string, RecordBuilder>();
    const recordLines: RecordLine[] = [];
    for (const point of points) {
      let recordBuilder = recordBuilders.get(point.measurement);
      if (!recordBuilder) {
        recordBuilder = new RecordBuilder(point.measurement);
        recordBuilders.set(point.measurement, recordBuilder);
      }
      const line = recordBuilder.newLine();
      for (const [key, value] of Object.entries(point.tags)) {
        line.addTag(key, value);
      }
      for (const [key, value] of Object.entries(point.fields)) {
        line.addField(key, value);
      }
      recordLines.push(line.build(point.timestamp));
    }

    const request = this.options.registry
      .get(target)
      .authenticate(this.options.username, this.options.password)
      .addRecord(...recordLines)
      .build();

    const response = await this.options.client.write(request, options);
    const error = interpretWriteResponse(response);
    if (error) {
      throw error;
    }
  }
}
