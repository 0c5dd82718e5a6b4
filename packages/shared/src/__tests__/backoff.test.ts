import assert from 'node:assert/strict';
import { test } from 'node:test';
import { computeExponentialBackoff, waitForRetry } from '../retries/backoff';

test('grows exponentially up to the cap', () => {
  assert.equal(computeExponentialBackoff(1, { jitterRatio: 0 }), 250);
  assert.equal(computeExponentialBackoff(3, { jitterRatio: 0 }), 1000);
  assert.equal(computeExponentialBackoff(10, { jitterRatio: 0 }), 10_000);
  assert.equal(computeExponentialBackoff(0, { baseMs: 100, jitterRatio: 0 }), 100);
});

test('applies symmetric jitter', () => {
  assert.equal(computeExponentialBackoff(2, { random: () => 1 }), 600);
  assert.equal(computeExponentialBackoff(2, { random: () => 0 }), 400);
  assert.equal(computeExponentialBackoff(2, { random: () => 0.5 }), 500);
});

test('waiting resolves immediately for a zero delay and honours abort signals', async () => {
  await waitForRetry(1, { baseMs: 0, maxMs: 0 });

  const controller = new AbortController();
  controller.abort();
  await assert.rejects(waitForRetry(1, { baseMs: 50, jitterRatio: 0 }, controller.signal), { name: 'AbortError' });
});
