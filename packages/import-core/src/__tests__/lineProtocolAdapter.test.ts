import assert from 'node:assert/strict';
import { test } from 'node:test';
import { LineProtocolAdapter } from '../adapters/lineProtocolAdapter';
import { ImportContext } from '../context/importContext';
import { DatabaseRequiredError, LineProtocolParseError } from '../errors';
import { collect, settingsFor, textStream } from './testUtils';

test('reads one unit per line', async () => {
  const adapter = new LineProtocolAdapter(settingsFor());
  assert.deepEqual(await collect(adapter.read(textStream('a\nb\r\n\nc'))), ['a', 'b', '', 'c']);
});

test('walks directives from DDL into DML', () => {
  const adapter = new LineProtocolAdapter(settingsFor());
  const context = new ImportContext();

  assert.deepEqual(adapter.process('# DDL', context), { kind: 'none' });
  assert.deepEqual(adapter.process('CREATE DATABASE db0', context), { kind: 'query', command: 'CREATE DATABASE db0' });
  assert.deepEqual(adapter.process('# just a comment', context), { kind: 'none' });
  assert.deepEqual(adapter.process('   ', context), { kind: 'none' });

  assert.deepEqual(adapter.process('# DML', context), { kind: 'none' });
  assert.equal(context.phase, 'dml');
  assert.equal(context.retentionPolicy, 'autogen');

  adapter.process('# CONTEXT-DATABASE: db0', context);
  adapter.process('# CONTEXT-RETENTION-POLICY: rp1', context);
  assert.deepEqual(adapter.process('  cpu,host=a v=1 10  ', context), {
    kind: 'enqueueLines',
    target: { database: 'db0', retentionPolicy: 'rp1' },
    lines: ['cpu,host=a v=1 10']
  });
});

test('DML data requires a database', () => {
  const adapter = new LineProtocolAdapter(settingsFor());
  const context = new ImportContext();
  adapter.process('# DML', context);

  assert.throws(
    () => adapter.process('cpu v=1 1', context),
    (err: unknown) =>
      err instanceof DatabaseRequiredError &&
      err.message === 'database is required, make sure `# CONTEXT-DATABASE:` token is exist'
  );
});

test('malformed data lines fail their unit', () => {
  const adapter = new LineProtocolAdapter(settingsFor());
  const context = new ImportContext({ database: 'db0' });
  adapter.process('# DML', context);

  assert.throws(() => adapter.process('cpu,host=a', context), LineProtocolParseError);
  assert.throws(() => adapter.process('cpu v=1 later', context), { message: 'invalid timestamp: later' });
});

test('database directives are honoured in the DDL phase too', () => {
  const adapter = new LineProtocolAdapter(settingsFor());
  const context = new ImportContext();
  adapter.process('# CONTEXT-DATABASE: early', context);
  assert.equal(context.phase, 'ddl');
  assert.equal(context.database, 'early');
});
