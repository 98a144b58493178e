/**
 * Timeout Guard Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  abortable,
  AbortedError,
  isAbortError,
  isTimeoutError,
  joinWithin,
  TimeoutError,
  withTimeout,
} from './timeout-guard.js';

function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

describe('withTimeout', () => {
  it('resolves when the promise wins', async () => {
    assert.equal(await withTimeout(delay(5, 'ok'), 200, 'fast'), 'ok');
  });

  it('rejects with TimeoutError and calls onTimeout', async () => {
    let timedOut = false;

    await assert.rejects(
      withTimeout(delay(200, 'late'), 10, 'slow_op', () => {
        timedOut = true;
      }),
      (error: unknown) => isTimeoutError(error) && error.operation === 'slow_op' && error.timeoutMs === 10
    );
    assert.equal(timedOut, true);
  });

  it('propagates the original rejection', async () => {
    await assert.rejects(withTimeout(Promise.reject(new Error('boom')), 100, 'op'), /boom/);
  });
});

describe('joinWithin', () => {
  it('reports settled tasks', async () => {
    assert.deepEqual(await joinWithin(delay(5, 3), 200), { settled: true, value: 3 });
  });

  it('reports tasks that miss the deadline', async () => {
    assert.deepEqual(await joinWithin(delay(200, 3), 10), { settled: false });
  });
});

describe('abortable', () => {
  it('passes through without a signal', async () => {
    assert.equal(await abortable(delay(1, 'v'), undefined, 'op'), 'v');
  });

  it('rejects as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = abortable(delay(200, 'v'), controller.signal, 'tier');
    controller.abort();

    await assert.rejects(pending, (error: unknown) => error instanceof AbortedError && isAbortError(error));
  });

  it('rejects immediately for an already-aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(abortable(delay(1, 'v'), controller.signal, 'tier'), AbortedError);
  });
});

describe('error guards', () => {
  it('recognise their errors', () => {
    assert.equal(isTimeoutError(new TimeoutError('x', 1)), true);
    assert.equal(isTimeoutError(new Error('x')), false);
    assert.equal(isAbortError(new AbortedError('x')), true);
  });
});
