import { describe, expect, it } from 'vitest';
import { backoffDelay, isTransientError, retryWithBackoff } from './retry.js';
import { SpotifyRequestError } from '../types/errors.js';

const unavailable = () => new SpotifyRequestError('Service unavailable', { statusCode: 503, retryable: true });

function recorder() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => void delays.push(ms) };
}

describe('retryWithBackoff', () => {
  it('retries transient failures with doubling delays', async () => {
    const { delays, sleep } = recorder();
    let calls = 0;
    const result = await retryWithBackoff(
      async () => {
        calls++;
        if (calls < 3) throw unavailable();
        return 'ok';
      },
      { maxAttempts: 4, baseDelayMs: 100, sleep }
    );

    expect(result).toEqual({ ok: true, value: 'ok', attempts: 3 });
    expect(delays).toEqual([100, 200]);
  });

  it('gives up at once on a permanent failure', async () => {
    const { delays, sleep } = recorder();
    const err = new Error('bad request');
    const result = await retryWithBackoff(
      async () => {
        throw err;
      },
      { maxAttempts: 4, baseDelayMs: 100, sleep }
    );

    expect(result).toEqual({ ok: false, error: err, attempts: 1, retryable: false });
    expect(delays).toEqual([]);
  });

  it('reports exhaustion as retryable', async () => {
    const { delays, sleep } = recorder();
    const result = await retryWithBackoff(
      async () => {
        throw unavailable();
      },
      { maxAttempts: 3, baseDelayMs: 100, sleep }
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.attempts).toBe(3);
      expect(result.retryable).toBe(true);
    }
    expect(delays).toEqual([100, 200]);
  });
});

describe('backoffDelay', () => {
  it('honours Retry-After', () => {
    const err = new SpotifyRequestError('rate limited', { statusCode: 429, retryable: true, retryAfterSeconds: 2 });
    expect(backoffDelay(1, 100, err)).toBe(2000);
    expect(backoffDelay(3, 100)).toBe(400);
  });
});

describe('isTransientError', () => {
  it('recognises network failures', () => {
    expect(isTransientError(Object.assign(new Error('socket reset'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isTransientError(new Error('Request timed out'))).toBe(true);
    expect(isTransientError(new SpotifyRequestError('Not found', { statusCode: 404, retryable: false }))).toBe(false);
    expect(isTransientError('nope')).toBe(false);
  });
});
