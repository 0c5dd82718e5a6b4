import assert from 'node:assert/strict';
import { test } from 'node:test';
import { WriteRequestBuilderRegistry } from '../dispatch/builderRegistry';
import { interpretWriteResponse } from '../dispatch/responseCodes';
import { RecordBuilder, WriteRequestBuilder } from '../dispatch/writeRequest';
import { WriteRequestBuildError, WriteResponseError } from '../errors';

test('groups record lines per measurement with their schema and time range', () => {
  const cpu = new RecordBuilder('cpu');
  const mem = new RecordBuilder('mem');
  const builder = new WriteRequestBuilder('db0', 'autogen');

  const request = builder
    .authenticate('reader', 'test-secret')
    .addRecord(
      cpu.newLine().addTag('host', 'a').addField('v', { type: 'float', value: 1 }).build(20n),
      mem.newLine().addField('free', { type: 'integer', value: 5n }).build(15n),
      cpu
        .newLine()
        .addTag('host', 'b')
        .addField('v', { type: 'float', value: 2 })
        .addField('ok', { type: 'boolean', value: true })
        .build(10n)
    )
    .build();

  assert.equal(request.database, 'db0');
  assert.equal(request.retentionPolicy, 'autogen');
  assert.equal(request.username, 'reader');
  assert.equal(request.password, 'test-secret');
  assert.deepEqual(
    request.records.map((record) => ({
      measurement: record.measurement,
      minTime: record.minTime,
      maxTime: record.maxTime,
      schema: record.schema,
      lines: record.lines.length
    })),
    [
      {
        measurement: 'cpu',
        minTime: 10n,
        maxTime: 20n,
        schema: [
          { name: 'host', kind: 'tag' },
          { name: 'v', kind: 'float' },
          { name: 'ok', kind: 'boolean' }
        ],
        lines: 2
      },
      { measurement: 'mem', minTime: 15n, maxTime: 15n, schema: [{ name: 'free', kind: 'integer' }], lines: 1 }
    ]
  );

  assert.throws(() => builder.build(), { name: 'WriteRequestBuildError', message: 'no records to write' });
});

test('rejects conflicting column types and empty names', () => {
  const cpu = new RecordBuilder('cpu');
  const builder = new WriteRequestBuilder('db0', 'autogen').addRecord(
    cpu.newLine().addField('v', { type: 'float', value: 1 }).build(1n),
    cpu.newLine().addField('v', { type: 'integer', value: 1n }).build(2n)
  );
  assert.throws(() => builder.build(), {
    message: 'column v of cpu has conflicting types: float and integer'
  });
  assert.throws(() => new RecordBuilder(''), WriteRequestBuildError);
  assert.throws(() => new WriteRequestBuilder('', 'autogen'), { message: 'database name is required' });
});

test('registry caches one builder per database and retention policy', () => {
  const registry = new WriteRequestBuilderRegistry();
  const first = registry.get({ database: 'db0', retentionPolicy: 'autogen' });
  assert.equal(registry.get({ database: 'db0', retentionPolicy: 'autogen' }), first);
  assert.notEqual(registry.get({ database: 'db0', retentionPolicy: 'weekly' }), first);
  assert.equal(registry.size, 2);
  assert.equal(WriteRequestBuilderRegistry.keyOf({ database: 'db0', retentionPolicy: 'weekly' }), 'db0.weekly');
});

test('maps column write response codes', () => {
  assert.equal(interpretWriteResponse({ code: 0 }), null);

  const partial = interpretWriteResponse({ code: 1, message: 'some rows rejected' });
  assert.ok(partial instanceof WriteResponseError);
  assert.equal(partial.message, 'write failed, code: 1, partial write failure');
  assert.equal(partial.responseMessage, 'some rows rejected');

  assert.equal(interpretWriteResponse({ code: 2 })?.message, 'write failed, code: 2, write failure');
  assert.equal(interpretWriteResponse({ code: 9 })?.message, 'unexpected response code: 9');
  assert.equal(interpretWriteResponse({ code: 9 })?.code, 9);
});
