import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RetryPolicy } from '../../types/config';
import { ServiceAuthError, TransientServiceError, TranslationCountMismatchError } from '../errors';
import { backoffDelay, classifyServiceError, withRetry, withTimeout } from './retry';

const instant: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

function httpError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe('classifyServiceError', () => {
  it('treats 401 and 403 as auth errors for the right stage', () => {
    const asr = classifyServiceError(httpError(401), 'asr');
    const translation = classifyServiceError(httpError(403), 'translation');

    expect(asr).toBeInstanceOf(ServiceAuthError);
    expect(asr).toMatchObject({ stage: 'transcribe', status: 401 });
    expect(translation).toBeInstanceOf(ServiceAuthError);
    expect(translation).toMatchObject({ stage: 'translate', status: 403 });
  });

  it('treats rate limits, server errors and connection failures as transient', () => {
    expect(classifyServiceError(httpError(429), 'asr')).toBeInstanceOf(TransientServiceError);
    expect(classifyServiceError(httpError(503), 'asr')).toBeInstanceOf(TransientServiceError);
    expect(classifyServiceError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }), 'asr')).toBeInstanceOf(
      TransientServiceError
    );

    const timeout = new Error('Request timed out.');
    timeout.name = 'APIConnectionTimeoutError';
    expect(classifyServiceError(timeout, 'translation')).toBeInstanceOf(TransientServiceError);
  });

  it('returns other errors unchanged', () => {
    const badRequest = httpError(400);
    const mismatch = new TranslationCountMismatchError(5, 4, 0);

    expect(classifyServiceError(badRequest, 'asr')).toBe(badRequest);
    expect(classifyServiceError(mismatch, 'translation')).toBe(mismatch);
  });
});

describe('backoffDelay', () => {
  it('doubles from the base delay up to the cap', () => {
    const policy: RetryPolicy = { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 8000 };

    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(policy, attempt))).toEqual([1000, 2000, 4000, 8000, 8000]);
  });
});

describe('withRetry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('retries transient failures until the call succeeds', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValue('ok');

    await expect(withRetry(operation, { service: 'asr', policy: instant, label: 'test' })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation).toHaveBeenLastCalledWith(3);
  });

  it('throws the last transient error once attempts run out', async () => {
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(httpError(502));

    await expect(withRetry(operation, { service: 'translation', policy: instant, label: 'test' })).rejects.toBeInstanceOf(
      TransientServiceError
    );
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry auth errors', async () => {
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(httpError(401));

    await expect(withRetry(operation, { service: 'asr', policy: instant, label: 'test' })).rejects.toBeInstanceOf(
      ServiceAuthError
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('rethrows unrecognized errors as they are', async () => {
    const boom = new Error('boom');
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(boom);

    await expect(withRetry(operation, { service: 'asr', policy: instant, label: 'test' })).rejects.toBe(boom);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('rejects with the supplied error when the promise is too slow', async () => {
    const pending = withTimeout(new Promise<never>(() => undefined), 100, () => new Error('late'));
    const assertion = expect(pending).rejects.toThrow('late');

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it('resolves and clears its timer when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve(5), 100, () => new Error('late'))).resolves.toBe(5);
    expect(vi.getTimerCount()).toBe(0);
  });
});
