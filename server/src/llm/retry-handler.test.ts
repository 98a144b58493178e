import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { getErrorStatus, RetryHandler } from './retry-handler.js';

class StatusError extends Error {
  constructor(public readonly status: number) {
    super(`HTTP ${status}`);
  }
}

const handler = new RetryHandler({ maxAttempts: 3, backoffMs: [0, 0, 0] });

describe('RetryHandler', () => {
  it('retries 429 and 5xx until success', async () => {
    const failures = [new StatusError(429), new StatusError(503)];
    const attempts: number[] = [];

    const result = await handler.executeWithRetry(async (attempt) => {
      attempts.push(attempt);
      const failure = failures[attempt];
      if (failure) throw failure;
      return 'ok';
    });

    assert.equal(result, 'ok');
    assert.deepEqual(attempts, [0, 1, 2]);
  });

  it('fails fast on auth errors', async () => {
    let calls = 0;

    await assert.rejects(
      handler.executeWithRetry(async () => {
        calls++;
        throw new StatusError(401);
      }),
      { status: 401 }
    );
    assert.equal(calls, 1);
  });

  it('rethrows the last error after all attempts', async () => {
    let calls = 0;

    await assert.rejects(
      handler.executeWithRetry(async () => {
        calls++;
        throw new Error('Request timed out.');
      }),
      /timed out/
    );
    assert.equal(calls, 3);
  });

  it('categorizes errors', () => {
    assert.equal(handler.categorizeError(new StatusError(500)).type, 'transport_error');
    assert.equal(handler.categorizeError(new StatusError(403)).type, 'auth_error');
    assert.equal(handler.categorizeError(new Error('Connection error.')).type, 'abort_timeout');
    assert.deepEqual(handler.categorizeError(new StatusError(400)), {
      type: 'unknown',
      isRetriable: false,
      reason: 'HTTP 400',
      statusCode: 400,
    });
  });

  it('reads numeric status only', () => {
    assert.equal(getErrorStatus({ status: 502 }), 502);
    assert.equal(getErrorStatus({ status: '502' }), undefined);
    assert.equal(getErrorStatus(null), undefined);
  });
});
