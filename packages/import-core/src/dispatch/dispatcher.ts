import { computeExponentialBackoff, waitForRetry, type BackoffOptions, type Logger } from '@series-import/shared';
import type { RequestOptions } from '../collaborators';
import { DEFAULT_MAX_FLUSH_ATTEMPTS } from '../constants';
import { FlushError, ImportAbortedError, isAbortError, isPermanentWriteError, toError } from '../errors';
import type { Point, WriteTarget } from '../types';
import { BatchBuffer } from './batchBuffer';
import type { WriteStrategy } from './writeStrategies';

export type BatchDispatcherOptions = {
  strategy: WriteStrategy;
  batchSize: number;
  logger: Logger;
  /** Attempts per batch before it is dropped; 1 gives at-most-once delivery. */
  maxFlushAttempts?: number;
  backoff?: BackoffOptions;
  /** Clock in epoch ms used to schedule retries of a retained batch. */
  now?: () => number;
};

export type DispatcherStats = {
  batchesWritten: number;
  batchesFailed: number;
  pointsDropped: number;
};

type LaneKind = 'lines' | 'points';

type Lane<T> = {
  kind: LaneKind;
  buffer: BatchBuffer<T>;
  write: (target: WriteTarget, batch: T[], options?: RequestOptions) => Promise<void>;
};

type FlushOutcome =
  | { status: 'written'; size: number }
  | { status: 'retained'; error: Error; attempt: number }
  | { status: 'dropped'; error: Error };

function abortedError(cause?: unknown): ImportAbortedError {
  return new ImportAbortedError('import aborted', { cause });
}

export class BatchDispatcher {
  readonly stats: DispatcherStats = { batchesWritten: 0, batchesFailed: 0, pointsDropped: 0 };

  private readonly strategy: WriteStrategy;
  private readonly batchSize: number;
  private readonly maxFlushAttempts: number;
  private readonly logger: Logger;
  private readonly backoff: BackoffOptions | undefined;
  private readonly now: () => number;
  /** Batches dropped outside a drain, reported by the next one. */
  private readonly carriedErrors: Error[] = [];
  private readonly lineLane: Lane<string>;
  private readonly pointLane: Lane<Point>;

  constructor(options: BatchDispatcherOptions) {
    this.strategy = options.strategy;
    this.batchSize = options.batchSize;
    this.maxFlushAttempts = Math.max(1, options.maxFlushAttempts ?? DEFAULT_MAX_FLUSH_ATTEMPTS);
    this.logger = options.logger;
    this.backoff = options.backoff;
    this.now = options.now ?? Date.now;
    this.lineLane = {
      kind: 'lines',
      buffer: new BatchBuffer<string>(),
      write: (target, batch, requestOptions) => this.strategy.writeLines(target, batch, requestOptions)
    };
    this.pointLane = {
      kind: 'points',
      buffer: new BatchBuffer<Point>(),
      write: (target, batch, requestOptions) => this.strategy.writePoints(target, batch, requestOptions)
    };
  }

  get pending(): { lines: number; points: number } {
    return { lines: this.lineLane.buffer.length, points: this.pointLane.buffer.length };
  }

  async enqueueLines(target: WriteTarget, lines: readonly string[], options: RequestOptions = {}): Promise<void> {
    await this.enqueue(this.lineLane, target, lines, options);
  }

  async enqueuePoints(target: WriteTarget, points: readonly Point[], options: RequestOptions = {}): Promise<void> {
    await this.enqueue(this.pointLane, target, points, options);
  }

  /**
   * Flushes both buffers until empty. Batches dropped here or since the last
   * drain are reported together in one FlushError.
   */
  async drain(options: RequestOptions = {}): Promise<void> {
    const errors = [
      ...this.carriedErrors.splice(0),
      ...(await this.drainLane(this.lineLane, options)),
      ...(await this.drainLane(this.pointLane, options))
    ];
    if (errors.length > 0) {
      throw new FlushError(errors);
    }
  }

  private async enqueue<T>(lane: Lane<T>, target: WriteTarget, items: readonly T[], options: RequestOptions) {
    if (!lane.buffer.accepts(target)) {
      // units already pending belong to the previous database or retention policy
      this.carriedErrors.push(...(await this.drainLane(lane, options)));
    }
    lane.buffer.push(target, items);
    while (lane.buffer.length >= this.batchSize && lane.buffer.isReady(this.now())) {
      const outcome = await this.flushOnce(lane, options);
      if (outcome.status === 'retained') {
        break;
      }
      if (outcome.status === 'dropped') {
        this.carriedErrors.push(outcome.error);
      }
    }
  }

  private async drainLane<T>(lane: Lane<T>, options: RequestOptions): Promise<Error[]> {
    const errors: Error[] = [];
    while (lane.buffer.length > 0) {
      const outcome = await this.flushOnce(lane, options);
      if (outcome.status === 'dropped') {
        errors.push(outcome.error);
      } else if (outcome.status === 'retained') {
        try {
          await waitForRetry(outcome.attempt, this.backoff, options.signal);
        } catch (err) {
          throw abortedError(err);
        }
      }
    }
    return errors;
  }

  private async flushOnce<T>(lane: Lane<T>, options: RequestOptions): Promise<FlushOutcome> {
    const { buffer, kind } = lane;
    const target = buffer.target;
    const batch = buffer.takeBatch(this.batchSize);
    if (!target || batch.length === 0) {
      return { status: 'written', size: 0 };
    }
    if (options.signal?.aborted) {
      throw abortedError(options.signal.reason);
    }

    try {
      await lane.write(target, batch, options);
    } catch (err) {
      if (isAbortError(err) || options.signal?.aborted) {
        throw abortedError(err);
      }
      const error = toError(err);
      const attempt = buffer.recordFailure();
      const context = {
        err: error,
        kind,
        size: batch.length,
        attempt,
        database: target.database,
        retentionPolicy: target.retentionPolicy
      };
      const permanent = isPermanentWriteError(error);
      if (permanent || attempt >= this.maxFlushAttempts) {
        buffer.acknowledge(batch.length);
        this.stats.batchesFailed += 1;
        this.stats.pointsDropped += batch.length;
        this.logger.error(
          context,
          permanent ? 'dropping batch that cannot be written' : 'dropping batch after failed flush'
        );
        return { status: 'dropped', error };
      }
      buffer.deferUntil(this.now() + computeExponentialBackoff(attempt, this.backoff));
      this.logger.warn(context, 'flush failed, batch kept for retry');
      return { status: 'retained', error, attempt };
    }

    buffer.acknowledge(batch.length);
    this.stats.batchesWritten += 1;
    this.logger.debug(
      { kind, size: batch.length, strategy: this.strategy.name, database: target.database },
      'batch written'
    );
    return { status: 'written', size: batch.length };
  }
}
