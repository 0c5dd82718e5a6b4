import { createReadStream } from 'node:fs';
import type { Readable } from 'node:stream';
import type { BackoffOptions, Logger } from '@series-import/shared';
import { createFormatAdapter } from './adapters';
import type { FormatAdapter } from './adapters/types';
import type { ColumnWriteClient, QueryClient, RequestOptions, RowWriteClient } from './collaborators';
import { parseImportConfig, resolveTimeMultiplier, type ImportConfig } from './config';
import { ImportContext } from './context/importContext';
import { WriteRequestBuilderRegistry } from './dispatch/builderRegistry';
import { BatchDispatcher } from './dispatch/dispatcher';
import { ColumnWriteStrategy, RowWriteStrategy, type WriteStrategy } from './dispatch/writeStrategies';
import { ImportAbortedError, ImportConfigurationError, isAbortError, isFatalImportError, toError } from './errors';
import type { ImportAction } from './types';

export type ImportSummary = {
  units: number;
  failedUnits: number;
  batchesWritten: number;
  batchesFailed: number;
  pointsDropped: number;
};

export type ImporterClients = {
  query: QueryClient;
  rowWrite: RowWriteClient;
  columnWrite?: ColumnWriteClient;
};

export type ImporterOptions = {
  config: ImportConfig;
  clients: ImporterClients;
  logger: Logger;
  backoff?: BackoffOptions;
  now?: () => bigint;
};

export type RunOptions = {
  signal?: AbortSignal;
};

function createStrategy(config: ImportConfig, clients: ImporterClients, timeMultiplier: bigint): WriteStrategy {
  if (!config.columnWrite) {
    return new RowWriteStrategy(clients.rowWrite, config.precision);
  }
  if (!clients.columnWrite) {
    throw new ImportConfigurationError('column write requested but no column write client is configured', {
      fatal: true
    });
  }
  return new ColumnWriteStrategy({
    client: clients.columnWrite,
    registry: new WriteRequestBuilderRegistry(),
    username: config.username,
    password: config.password,
    timeMultiplier
  });
}

/**
 * Drives one import run: reads units from the adapter, applies their actions
 * and forces a final drain at end of input. Per-unit failures are logged and
 * skipped; only fatal configuration errors and cancellation end the run early.
 */
export class Importer {
  readonly context: ImportContext;
  readonly dispatcher: BatchDispatcher;

  private readonly adapter: FormatAdapter<unknown>;
  private readonly config: ImportConfig;
  private readonly queryClient: QueryClient;
  private readonly logger: Logger;

  constructor(options: ImporterOptions) {
    const { config, clients } = options;
    const timeMultiplier = resolveTimeMultiplier(config.precision);
    this.config = config;
    this.queryClient = clients.query;
    this.logger = options.logger.child({ format: config.format });
    this.context = new ImportContext({
      database: config.database,
      retentionPolicy: config.retentionPolicy,
      measurement: config.measurement
    });
    this.adapter = createFormatAdapter(config.format, {
      database: config.database,
      retentionPolicy: config.retentionPolicy,
      measurement: config.measurement,
      tags: config.tags,
      fields: config.fields,
      timeField: config.timeField,
      timeMultiplier,
      logger: this.logger,
      now: options.now
    });
    this.dispatcher = new BatchDispatcher({
      strategy: createStrategy(config, clients, timeMultiplier),
      batchSize: config.batchSize,
      maxFlushAttempts: config.maxFlushAttempts,
      logger: this.logger,
      backoff: options.backoff
    });
  }

  async run(stream: Readable, options: RunOptions = {}): Promise<ImportSummary> {
    const { signal } = options;
    let units = 0;
    let failedUnits = 0;
    let readError: Error | null = null;

    try {
      for await (const unit of this.adapter.read(stream)) {
        if (signal?.aborted) {
          throw new ImportAbortedError('import aborted', { cause: signal.reason });
        }
        units += 1;
        try {
          await this.apply(this.adapter.process(unit, this.context), { signal });
        } catch (err) {
          if (isFatalImportError(err)) {
            throw err;
          }
          if (isAbortError(err) || signal?.aborted) {
            throw new ImportAbortedError('import aborted', { cause: err });
          }
          failedUnits += 1;
          this.logger.error({ err: toError(err), unit: units }, 'process unit failed');
        }
      }
    } catch (err) {
      if (isFatalImportError(err) || isAbortError(err)) {
        throw err;
      }
      readError = toError(err);
      this.logger.error({ err: readError, unit: units }, 'read input failed');
    } finally {
      stream.destroy();
    }

    try {
      await this.dispatcher.drain({ signal });
    } catch (err) {
      if (isAbortError(err)) {
        throw err;
      }
      this.logger.error({ err: toError(err) }, 'clear buffer failed');
    }

    if (readError) {
      throw readError;
    }

    const summary: ImportSummary = { units, failedUnits, ...this.dispatcher.stats };
    this.logger.info({ path: this.config.path, ...summary }, 'process finished');
    return summary;
  }

  private async apply(action: ImportAction, options: RequestOptions): Promise<void> {
    switch (action.kind) {
      case 'none':
        return;
      case 'query':
        await this.queryClient.query(action.command, options);
        this.logger.info({ command: action.command }, 'execute ddl success');
        return;
      case 'enqueueLines':
        await this.dispatcher.enqueueLines(action.target, action.lines, options);
        return;
      case 'enqueuePoints':
        await this.dispatcher.enqueuePoints(action.target, action.points, options);
        return;
    }
  }
}

export type ImportFileOptions = Omit<ImporterOptions, 'config'> & RunOptions & { config: unknown };

/** Validates the configuration, opens `config.path` and runs the import. */
export async function importFile(options: ImportFileOptions): Promise<ImportSummary> {
  const config = parseImportConfig(options.config);
  if (!config.path) {
    throw new ImportConfigurationError('path is required', { fatal: true });
  }
  const importer = new Importer({ ...options, config });
  const stream = createReadStream(config.path);
  options.logger.info({ path: config.path, format: config.format, columnWrite: config.columnWrite }, 'import started');
  return importer.run(stream, { signal: options.signal });
}
