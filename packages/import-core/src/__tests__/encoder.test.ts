import assert from 'node:assert/strict';
import { test } from 'node:test';
import { encodeFieldValue, escapeKey, formatPoint } from '../lineProtocol/encoder';
import { parseLine } from '../lineProtocol/tokenizer';
import { createPoint } from '../point';

test('escapes structural characters in names', () => {
  assert.equal(escapeKey('cpu load,x=[1]'), 'cpu\\ load\\,x\\=\\[1\\]');
});

test('encodes typed field values', () => {
  assert.equal(encodeFieldValue({ type: 'integer', value: -7n }), '-7i');
  assert.equal(encodeFieldValue({ type: 'float', value: 2 }), '2');
  assert.equal(encodeFieldValue({ type: 'boolean', value: false }), 'false');
  assert.equal(encodeFieldValue({ type: 'string', value: 'x"y' }), '"x\\"y"');
});

test('renders points that tokenize back to the same point', () => {
  const point = createPoint({
    measurement: 'cpu load',
    tags: { host: 'a,b' },
    fields: {
      v: { type: 'integer', value: 5n },
      s: { type: 'string', value: 'x"y' },
      f: { type: 'float', value: 1.5 },
      b: { type: 'boolean', value: true }
    },
    timestamp: 10n
  });

  const line = formatPoint(point);
  assert.equal(line, 'cpu\\ load,host=a\\,b v=5i,s="x\\"y",f=1.5,b=true 10');
  assert.deepEqual(parseLine(line), point);
});
