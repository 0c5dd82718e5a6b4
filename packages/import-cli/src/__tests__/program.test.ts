import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { after, afterEach, before, test } from 'node:test';
import type { ColumnWriteResponse, Precision, WriteRequest } from '@series-import/import-core';
import type { PingResult } from '@series-import/series-client';
import { createLogger } from '@series-import/shared';
import type { ConnectionSettings } from '../connectionConfig';
import { CLI_VERSION, createInterface, type CliClients } from '../program';

class StubClients implements CliClients {
  readonly connections: ConnectionSettings[] = [];
  readonly commands: string[] = [];
  readonly writes: { database: string; retentionPolicy: string; lines: string; precision: Precision }[] = [];
  readonly columnRequests: WriteRequest[] = [];
  pings = 0;

  readonly query = {
    query: async (command: string): Promise<unknown> => {
      this.commands.push(command);
      return { results: [] };
    }
  };

  readonly rowWrite = {
    write: async (database: string, retentionPolicy: string, lines: string, precision: Precision): Promise<void> => {
      this.writes.push({ database, retentionPolicy, lines, precision });
    }
  };

  readonly columnWrite = {
    write: async (request: WriteRequest): Promise<ColumnWriteResponse> => {
      this.columnRequests.push(request);
      return { code: 0 };
    }
  };

  async ping(): Promise<PingResult> {
    this.pings += 1;
    return { version: 'v1.2.3', durationMs: 3 };
  }

  factory = (connection: ConnectionSettings): CliClients => {
    this.connections.push(connection);
    return this;
  };
}

const silentLogger = createLogger({ level: 'silent' });
const originalLog = console.log;
let captured: unknown[][] = [];
let directory = '';

before(async () => {
  directory = await mkdtemp(path.join(tmpdir(), 'series-import-cli-'));
});

after(async () => {
  await rm(directory, { recursive: true, force: true });
});

afterEach(() => {
  console.log = originalLog;
  captured = [];
});

function captureLog(): void {
  console.log = (...args: unknown[]) => {
    captured.push(args);
  };
}

async function writeInput(name: string, content: string): Promise<string> {
  const filePath = path.join(directory, name);
  await writeFile(filePath, content);
  return filePath;
}

test('import forwards connection flags and writes the file', async () => {
  const stub = new StubClients();
  captureLog();
  const filePath = await writeInput('data.txt', '# DML\ncpu v=1 1\n');
  const program = createInterface({ clientFactory: stub.factory, logger: silentLogger, env: {} });

  await program.parseAsync(
    [
      '--host',
      'db.internal',
      '--port',
      '9086',
      '--username',
      'writer',
      '--password',
      'test-secret',
      'import',
      '--path',
      filePath,
      '--database',
      'db0',
      '--precision',
      's',
      '--batch-size',
      '1'
    ],
    { from: 'user' }
  );

  assert.deepEqual(stub.connections, [
    {
      host: 'db.internal',
      port: 9086,
      columnWritePort: 8305,
      username: 'writer',
      password: 'test-secret',
      timeoutMs: 10_000,
      ssl: false,
      logLevel: 'info'
    }
  ]);
  assert.deepEqual(stub.writes, [{ database: 'db0', retentionPolicy: 'autogen', lines: 'cpu v=1 1', precision: 's' }]);
  assert.deepEqual(captured, [
    [{ units: 2, failedUnits: 0, batchesWritten: 1, batchesFailed: 0, pointsDropped: 0 }]
  ]);
});

test('csv import through the column writer', async () => {
  const stub = new StubClients();
  captureLog();
  const filePath = await writeInput('data.csv', 'time,host,usage\n1,a,0.5\n');
  const program = createInterface({ clientFactory: stub.factory, logger: silentLogger, env: {} });

  await program.parseAsync(
    [
      'import',
      '--path',
      filePath,
      '--format',
      'csv',
      '--database',
      'db0',
      '--measurement',
      'm',
      '--tags',
      'host',
      '--precision',
      's',
      '--column-write',
      '--column-write-port',
      '9305'
    ],
    { from: 'user' }
  );

  assert.equal(stub.connections[0]?.columnWritePort, 9305);
  assert.deepEqual(stub.commands, ['CREATE DATABASE db0']);
  assert.equal(stub.columnRequests.length, 1);
  assert.equal(stub.columnRequests[0]?.records[0]?.minTime, 1_000_000_000n);
  assert.equal(stub.writes.length, 0);
});

test('ping prints the server version as json', async () => {
  const stub = new StubClients();
  captureLog();
  const program = createInterface({ clientFactory: stub.factory, logger: silentLogger, env: {} });

  await program.parseAsync(['--json', 'ping'], { from: 'user' });
  assert.equal(stub.pings, 1);
  assert.deepEqual(captured, [[JSON.stringify({ version: 'v1.2.3', durationMs: 3 }, null, 2)]]);
});

test('version prints the cli version', async () => {
  captureLog();
  const program = createInterface({ env: {} });
  await program.parseAsync(['version'], { from: 'user' });
  assert.deepEqual(captured, [[`series-import ${CLI_VERSION}`]]);
});

test('invalid flags are rejected by the parser', async () => {
  const program = createInterface({ env: {} });
  program.exitOverride();
  program.configureOutput({ writeErr: () => undefined });

  await assert.rejects(program.parseAsync(['--port', 'abc', 'ping'], { from: 'user' }), {
    code: 'commander.invalidArgument'
  });
});

test('invalid environment defaults fail the command', async () => {
  const stub = new StubClients();
  const program = createInterface({
    clientFactory: stub.factory,
    logger: silentLogger,
    env: { SERIES_IMPORT_PORT: '0' }
  });

  await assert.rejects(program.parseAsync(['ping'], { from: 'user' }), { name: 'EnvConfigError' });
  assert.equal(stub.pings, 0);
});
