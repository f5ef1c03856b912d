import { Logger } from './logger.js';
import { SpotifyRequestError } from '../types/errors.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  label?: string;
  // Injected in tests to skip real waiting
  sleep?: (ms: number) => Promise<void>;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; retryable: boolean };

const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED', 'EPIPE']);

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

// 429, 5xx, and common network failures are worth another attempt
export function isTransientError(err: unknown): boolean {
  if (err instanceof SpotifyRequestError) return err.retryable;
  if (!(err instanceof Error)) return false;
  const code = 'code' in err ? String(err.code) : '';
  if (TRANSIENT_CODES.has(code)) return true;
  return /timeout|timed out|ETIMEDOUT|fetch failed|socket hang up/i.test(err.message);
}

export function backoffDelay(attempt: number, baseDelayMs: number, err?: unknown): number {
  if (err instanceof SpotifyRequestError && err.retryAfterSeconds > 0) {
    return err.retryAfterSeconds * 1000;
  }
  return baseDelayMs * Math.pow(2, attempt - 1); // base, 2x, 4x, ...
}

/**
 * Runs `fn` up to `maxAttempts` times, sleeping with exponential backoff between
 * transient failures. Never throws: the outcome is returned as a RetryResult.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<RetryResult<T>> {
  const wait = opts.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await fn();
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      lastErr = err;
      if (!isTransientError(err)) {
        return { ok: false, error: err, attempts: attempt, retryable: false };
      }
      if (attempt < maxAttempts) {
        const delay = backoffDelay(attempt, opts.baseDelayMs, err);
        Logger.warn(`${opts.label ?? 'Request'} failed (attempt ${attempt}/${maxAttempts}). Retrying in ${delay}ms...`);
        await wait(delay);
      }
    }
  }
  return { ok: false, error: lastErr, attempts: maxAttempts, retryable: true };
}
