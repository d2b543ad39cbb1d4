import { describe, it, expect, vi } from 'vitest';
import { CapabilityTimeoutError, ValidationError } from '../lib/errors.js';
import { isTransient, withRetry } from '../lib/retry.js';

describe('withRetry', () => {
  it('retries transient HTTP status errors', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) throw Object.assign(new Error('temporary outage'), { status: 503 });
      return 'ok';
    }, { maxAttempts: 3, baseDelay: 1 });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('retries transient network error codes', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 2) throw Object.assign(new Error('socket closed'), { code: 'econnreset' });
      return 42;
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe(42);
    expect(attempts).toBe(2);
  });

  it('uses Retry-After header from response metadata', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) {
        throw Object.assign(new Error('rate limited'), {
          response: { status: 429, headers: new Headers([['retry-after', '0.001']]) },
        });
      }
      return 'done';
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe('done');
    expect(attempts).toBe(2);
  });

  it('retries capability timeouts and reports each retry', async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new CapabilityTimeoutError('text-analyzer', 5);
    }, { maxAttempts: 3, baseDelay: 1, onRetry })).rejects.toBeInstanceOf(CapabilityTimeoutError);

    expect(attempts).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenLastCalledWith(2, expect.any(CapabilityTimeoutError));
  });

  it('does not retry non-transient errors', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new ValidationError('Invalid observation: strength out of range');
    }, { maxAttempts: 3, baseDelay: 1 })).rejects.toThrow('strength out of range');
    expect(attempts).toBe(1);
  });

  it('wraps non-Error throws', async () => {
    await expect(withRetry(async () => {
      throw 'plain string';
    }, { maxAttempts: 1 })).rejects.toThrow('plain string');
  });
});

describe('isTransient', () => {
  it('recognises status text embedded in the message', () => {
    expect(isTransient(new Error('Request failed with status 502'))).toBe(true);
    expect(isTransient(new Error('Request failed with status 404'))).toBe(false);
  });

  it('recognises overload messages', () => {
    expect(isTransient(new Error('Model is overloaded'))).toBe(true);
  });
});
