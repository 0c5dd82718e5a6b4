import { Command, InvalidArgumentError, Option } from 'commander';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_FLUSH_ATTEMPTS,
  DEFAULT_TIME_FIELD,
  IMPORT_FORMATS,
  importFile,
  type ImporterClients,
  type RequestOptions
} from '@series-import/import-core';
import { ColumnWriteHttpClient, SeriesHttpClient, type PingResult } from '@series-import/series-client';
import { createLogger, type EnvSource, type Logger } from '@series-import/shared';
import {
  buildBaseUrl,
  loadConnectionDefaults,
  resolveConnection,
  type ConnectionSettings
} from './connectionConfig';

export const CLI_VERSION = '0.1.0';

type GlobalOptions = {
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  timeout?: number;
  ssl?: boolean;
  json?: boolean;
};

type ImportCommandOptions = {
  path: string;
  format: string;
  database?: string;
  retentionPolicy?: string;
  measurement?: string;
  tags?: string[];
  fields?: string[];
  timeField: string;
  precision: string;
  batchSize: number;
  columnWrite?: boolean;
  columnWritePort?: number;
  maxFlushAttempts: number;
};

export interface CliClients extends ImporterClients {
  ping(options?: RequestOptions): Promise<PingResult>;
}

function parseInteger(label: string, min: number, max = Number.MAX_SAFE_INTEGER) {
  return (value: string): number => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || String(parsed) !== value.trim() || parsed < min || parsed > max) {
      const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
      throw new InvalidArgumentError(`${label} must be an integer ${range}`);
    }
    return parsed;
  };
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function formatOutput(payload: unknown, asJson: boolean | undefined): void {
  if (asJson) {
    console.log(JSON.stringify(payload, null, 2));
    return;
  }
  console.log(payload);
}

function createClients(connection: ConnectionSettings): CliClients {
  const shared = {
    username: connection.username,
    password: connection.password,
    userAgent: `series-import/${CLI_VERSION}`,
    fetchTimeoutMs: connection.timeoutMs
  };
  const series = new SeriesHttpClient({ baseUrl: buildBaseUrl(connection, connection.port), ...shared });
  return {
    query: series,
    rowWrite: series,
    columnWrite: new ColumnWriteHttpClient({
      baseUrl: buildBaseUrl(connection, connection.columnWritePort),
      ...shared
    }),
    ping: (options) => series.ping(options)
  };
}

async function handleImport(
  clients: CliClients,
  connection: ConnectionSettings,
  logger: Logger,
  options: GlobalOptions,
  cmdOptions: ImportCommandOptions
): Promise<void> {
  const abortController = new AbortController();
  const stop = () => {
    logger.warn('interrupt received, stopping import');
    abortController.abort();
    process.off('SIGINT', stop);
  };
  process.on('SIGINT', stop);

  try {
    const summary = await importFile({
      config: {
        path: cmdOptions.path,
        format: cmdOptions.format,
        database: cmdOptions.database,
        retentionPolicy: cmdOptions.retentionPolicy,
        measurement: cmdOptions.measurement,
        tags: cmdOptions.tags,
        fields: cmdOptions.fields,
        timeField: cmdOptions.timeField,
        precision: cmdOptions.precision,
        batchSize: cmdOptions.batchSize,
        columnWrite: Boolean(cmdOptions.columnWrite),
        username: connection.username,
        password: connection.password,
        maxFlushAttempts: cmdOptions.maxFlushAttempts
      },
      clients,
      logger,
      signal: abortController.signal
    });
    formatOutput(summary, options.json);
  } finally {
    process.off('SIGINT', stop);
  }
}

async function handlePing(clients: CliClients, options: GlobalOptions): Promise<void> {
  const result = await clients.ping();
  if (options.json) {
    formatOutput(result, true);
    return;
  }
  console.log(`pong from ${result.version ?? 'unknown version'} in ${result.durationMs}ms`);
}

type CliDependencies = {
  clientFactory?: (connection: ConnectionSettings) => CliClients;
  logger?: Logger;
  env?: EnvSource;
};

export function createInterface(deps: CliDependencies = {}): Command {
  const clientFactory = deps.clientFactory ?? createClients;
  const program = new Command();

  const connect = (columnWritePort?: number) => {
    const options = program.opts<GlobalOptions>();
    const connection = resolveConnection(loadConnectionDefaults(deps.env), {
      host: options.host,
      port: options.port,
      username: options.username,
      password: options.password,
      timeoutMs: options.timeout,
      ssl: options.ssl,
      columnWritePort
    });
    return { options, connection, clients: clientFactory(connection) };
  };

  program
    .name('series-import')
    .description('Bulk import of line protocol, CSV and JSON exports into a time-series database')
    .option('--host <host>', 'Database host')
    .option('--port <port>', 'HTTP port', parseInteger('port', 1, 65535))
    .option('--username <username>', 'Username for basic authentication')
    .option('--password <password>', 'Password for basic authentication')
    .option('--timeout <ms>', 'HTTP request timeout in milliseconds', parseInteger('timeout', 0))
    .option('--ssl', 'Use https')
    .option('--json', 'Output raw JSON responses');

  program
    .command('import')
    .description('Import a file in batches')
    .requiredOption('--path <file>', 'File to import')
    .addOption(new Option('--format <format>', 'Input format').choices(IMPORT_FORMATS).default('line_protocol'))
    .option('--database <name>', 'Target database (required for csv and json input)')
    .option('--retention-policy <name>', 'Target retention policy')
    .option('--measurement <name>', 'Measurement for csv and json input')
    .option('--tags <names>', 'Comma-separated tag columns', parseList)
    .option('--fields <names>', 'Comma-separated field columns', parseList)
    .option('--time-field <name>', 'Timestamp column', DEFAULT_TIME_FIELD)
    .option('--precision <precision>', 'Timestamp precision (s, ms, us, ns)', 'ns')
    .option('--batch-size <size>', 'Units per write batch', parseInteger('batch size', 1), DEFAULT_BATCH_SIZE)
    .option('--column-write', 'Write through the column write endpoint')
    .option('--column-write-port <port>', 'Column write port', parseInteger('column write port', 1, 65535))
    .option(
      '--max-flush-attempts <count>',
      'Attempts per batch before it is dropped',
      parseInteger('max flush attempts', 1),
      DEFAULT_MAX_FLUSH_ATTEMPTS
    )
    .action(async (cmdOptions: ImportCommandOptions) => {
      const { options, connection, clients } = connect(cmdOptions.columnWritePort);
      const logger = deps.logger ?? createLogger({ level: connection.logLevel, name: 'series-import' });
      await handleImport(clients, connection, logger, options, cmdOptions);
    });

  program
    .command('ping')
    .description('Check that the database answers')
    .action(async () => {
      const { options, clients } = connect();
      await handlePing(clients, options);
    });

  program
    .command('version')
    .description('Print the CLI version')
    .action(() => {
      console.log(`series-import ${CLI_VERSION}`);
    });

  return program;
}
