import assert from 'node:assert/strict';
import { test } from 'node:test';
import { BatchDispatcher } from '../dispatch/dispatcher';
import { FlushError, ImportAbortedError, LineProtocolParseError, WriteRequestBuildError } from '../errors';
import { createPoint } from '../point';
import type { WriteTarget } from '../types';
import { RecordingStrategy, silentLogger } from './testUtils';

const target: WriteTarget = { database: 'db0', retentionPolicy: 'autogen' };
const otherTarget: WriteTarget = { database: 'db1', retentionPolicy: 'autogen' };
const noDelay = { baseMs: 0, maxMs: 0 };

function point(measurement: string) {
  return createPoint({ measurement, fields: { v: { type: 'float', value: 1 } }, timestamp: 1n });
}

test('flushes automatically at the batch threshold and drains the rest', async () => {
  const strategy = new RecordingStrategy();
  const dispatcher = new BatchDispatcher({ strategy, batchSize: 3, logger: silentLogger });

  for (const line of ['l1', 'l2', 'l3', 'l4', 'l5']) {
    await dispatcher.enqueueLines(target, [line]);
  }
  assert.deepEqual(
    strategy.calls.map((call) => call.batch),
    [['l1', 'l2', 'l3']]
  );
  assert.deepEqual(dispatcher.pending, { lines: 2, points: 0 });

  await dispatcher.drain();
  assert.deepEqual(
    strategy.calls.map((call) => call.batch),
    [
      ['l1', 'l2', 'l3'],
      ['l4', 'l5']
    ]
  );
  assert.deepEqual(dispatcher.pending, { lines: 0, points: 0 });
  assert.deepEqual(dispatcher.stats, { batchesWritten: 2, batchesFailed: 0, pointsDropped: 0 });
});

test('large enqueues are split into several batches', async () => {
  const strategy = new RecordingStrategy();
  const dispatcher = new BatchDispatcher({ strategy, batchSize: 2, logger: silentLogger });

  await dispatcher.enqueueLines(target, ['a', 'b', 'c', 'd', 'e']);
  assert.deepEqual(
    strategy.calls.map((call) => call.batch),
    [
      ['a', 'b'],
      ['c', 'd']
    ]
  );
  assert.equal(dispatcher.pending.lines, 1);
});

test('points go through their own buffer', async () => {
  const strategy = new RecordingStrategy();
  const dispatcher = new BatchDispatcher({ strategy, batchSize: 2, logger: silentLogger });

  await dispatcher.enqueuePoints(target, [point('cpu')]);
  await dispatcher.enqueueLines(target, ['x v=1']);
  await dispatcher.enqueuePoints(target, [point('mem')]);
  assert.deepEqual(strategy.calls, [{ kind: 'points', target, batch: ['cpu', 'mem'] }]);
  assert.deepEqual(dispatcher.pending, { lines: 1, points: 0 });
});

test('a failed batch stays at the head and is retried once its backoff has passed', async () => {
  let clock = 0;
  const strategy = new RecordingStrategy((_call, index) => (index === 0 ? new Error('connection reset') : null));
  const dispatcher = new BatchDispatcher({
    strategy,
    batchSize: 2,
    logger: silentLogger,
    backoff: { baseMs: 1000, maxMs: 1000, jitterRatio: 0 },
    now: () => clock
  });

  await dispatcher.enqueueLines(target, ['a', 'b']);
  assert.equal(dispatcher.pending.lines, 2);
  assert.equal(dispatcher.stats.batchesWritten, 0);

  clock = 999;
  await dispatcher.enqueueLines(target, ['c']);
  assert.equal(strategy.calls.length, 1);
  assert.equal(dispatcher.pending.lines, 3);

  clock = 1000;
  await dispatcher.enqueueLines(target, ['d']);
  assert.deepEqual(
    strategy.calls.map((call) => call.batch),
    [
      ['a', 'b'],
      ['a', 'b'],
      ['c', 'd']
    ]
  );
  assert.equal(dispatcher.pending.lines, 0);
  assert.equal(dispatcher.stats.batchesWritten, 2);
});

test('batches that cannot be built are dropped without a retry', async () => {
  const strategy = new RecordingStrategy(
    () => new WriteRequestBuildError('column v of cpu has conflicting types: float and string')
  );
  const dispatcher = new BatchDispatcher({
    strategy,
    batchSize: 1,
    maxFlushAttempts: 3,
    logger: silentLogger,
    backoff: noDelay
  });

  await dispatcher.enqueueLines(target, ['a']);
  assert.equal(strategy.calls.length, 1);
  assert.deepEqual(dispatcher.stats, { batchesWritten: 0, batchesFailed: 1, pointsDropped: 1 });

  await dispatcher.enqueuePoints(target, [point('cpu')]);
  await assert.rejects(dispatcher.drain(), (err: unknown) => {
    assert.ok(err instanceof FlushError);
    assert.equal(err.errors.length, 2);
    assert.ok(err.errors.every((error) => error instanceof WriteRequestBuildError));
    return true;
  });
  assert.equal(strategy.calls.length, 2);
});

test('unparseable lines are dropped on the first failure', async () => {
  const strategy = new RecordingStrategy(() => new LineProtocolParseError('no fields input', 'cpu'));
  const dispatcher = new BatchDispatcher({ strategy, batchSize: 10, maxFlushAttempts: 3, logger: silentLogger });

  await dispatcher.enqueueLines(target, ['cpu']);
  await assert.rejects(dispatcher.drain(), FlushError);
  assert.equal(strategy.calls.length, 1);
  assert.deepEqual(dispatcher.pending, { lines: 0, points: 0 });
});

test('batches are dropped after the last attempt and reported by the drain', async () => {
  const strategy = new RecordingStrategy((call) => new Error(`${call.kind} down`));
  const dispatcher = new BatchDispatcher({
    strategy,
    batchSize: 10,
    maxFlushAttempts: 2,
    logger: silentLogger,
    backoff: noDelay
  });

  await dispatcher.enqueueLines(target, ['a']);
  await dispatcher.enqueuePoints(target, [point('cpu')]);

  await assert.rejects(dispatcher.drain(), (err: unknown) => {
    assert.ok(err instanceof FlushError);
    assert.equal(err.message, 'lines down\npoints down');
    assert.equal(err.errors.length, 2);
    return true;
  });
  assert.equal(strategy.calls.length, 4);
  assert.deepEqual(dispatcher.stats, { batchesWritten: 0, batchesFailed: 2, pointsDropped: 2 });
  assert.deepEqual(dispatcher.pending, { lines: 0, points: 0 });
});

test('a single attempt gives at-most-once delivery', async () => {
  const strategy = new RecordingStrategy(() => new Error('down'));
  const dispatcher = new BatchDispatcher({ strategy, batchSize: 1, maxFlushAttempts: 1, logger: silentLogger });

  await dispatcher.enqueueLines(target, ['a']);
  await dispatcher.enqueueLines(target, ['b']);
  assert.equal(strategy.calls.length, 2);
  assert.deepEqual(dispatcher.stats, { batchesWritten: 0, batchesFailed: 2, pointsDropped: 2 });
});

test('pending units are flushed before switching targets', async () => {
  const strategy = new RecordingStrategy();
  const dispatcher = new BatchDispatcher({ strategy, batchSize: 10, logger: silentLogger });

  await dispatcher.enqueueLines(target, ['a']);
  await dispatcher.enqueueLines(otherTarget, ['b']);
  assert.deepEqual(strategy.calls, [{ kind: 'lines', target, batch: ['a'] }]);

  await dispatcher.drain();
  assert.deepEqual(strategy.calls[1], { kind: 'lines', target: otherTarget, batch: ['b'] });
});

test('batches dropped while switching targets are reported by the drain', async () => {
  const strategy = new RecordingStrategy((call) => (call.target.database === 'db0' ? new Error('db0 down') : null));
  const dispatcher = new BatchDispatcher({
    strategy,
    batchSize: 10,
    maxFlushAttempts: 2,
    logger: silentLogger,
    backoff: noDelay
  });

  await dispatcher.enqueueLines(target, ['a']);
  await dispatcher.enqueueLines(otherTarget, ['b']);
  assert.deepEqual(dispatcher.stats, { batchesWritten: 0, batchesFailed: 1, pointsDropped: 1 });

  await assert.rejects(dispatcher.drain(), (err: unknown) => {
    assert.ok(err instanceof FlushError);
    assert.equal(err.message, 'db0 down');
    return true;
  });
  assert.deepEqual(dispatcher.stats, { batchesWritten: 1, batchesFailed: 1, pointsDropped: 1 });

  await dispatcher.drain();
});

test('cancellation is never retried', async () => {
  const strategy = new RecordingStrategy();
  const dispatcher = new BatchDispatcher({ strategy, batchSize: 1, logger: silentLogger });
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(dispatcher.enqueueLines(target, ['a'], { signal: controller.signal }), ImportAbortedError);
  assert.equal(strategy.calls.length, 0);
  assert.equal(dispatcher.pending.lines, 1);

  const abortingStrategy = new RecordingStrategy(() => Object.assign(new Error('aborted'), { name: 'AbortError' }));
  const aborting = new BatchDispatcher({ strategy: abortingStrategy, batchSize: 1, logger: silentLogger });
  await assert.rejects(aborting.enqueueLines(target, ['a']), { name: 'ImportAbortedError' });
  assert.equal(aborting.stats.batchesFailed, 0);
});
