import { RetryPolicy } from '../../types/config';
import {
  ServiceAuthError,
  ServiceName,
  SubtitleAssistantError,
  TransientServiceError,
  errorMessage,
} from '../errors';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
};

const TRANSIENT_STATUS = new Set([408, 409, 425, 429]);
const AUTH_STATUS = new Set([401, 403]);
const TRANSIENT_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);
const TRANSIENT_NAMES = new Set(['AbortError', 'TimeoutError', 'APIConnectionError', 'APIConnectionTimeoutError']);

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const status = 'status' in error ? error.status : undefined;
  if (typeof status === 'number') return status;
  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'number' ? code : undefined;
}

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Map an error thrown by an SDK call to the pipeline taxonomy.
 *
 * Both the openai and @google/genai SDKs expose the HTTP status as `status`; network
 * failures surface as Node error codes or SDK connection errors. Errors already in the
 * taxonomy pass through. Anything unrecognized is returned unchanged.
 */
export function classifyServiceError(error: unknown, service: ServiceName): unknown {
  if (error instanceof SubtitleAssistantError) return error;

  const status = readStatus(error);
  const message = errorMessage(error);

  if (status !== undefined && AUTH_STATUS.has(status)) {
    return new ServiceAuthError(service, `${service} service rejected credentials (${status}): ${message}`, {
      cause: error,
      status,
    });
  }
  if (status !== undefined && (TRANSIENT_STATUS.has(status) || status >= 500)) {
    return new TransientServiceError(service, `${service} service unavailable (${status}): ${message}`, {
      cause: error,
      status,
    });
  }

  const code = readCode(error);
  const name = error instanceof Error ? error.name : undefined;
  if ((code && TRANSIENT_CODES.has(code)) || (name && TRANSIENT_NAMES.has(name))) {
    return new TransientServiceError(service, `${service} service unreachable: ${message}`, { cause: error });
  }

  return error;
}

/** Exponential backoff: base, 2*base, 4*base ... capped at maxDelayMs */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  service: ServiceName;
  policy: RetryPolicy;
  /** Short description for log lines (e.g. 'batch 2/5') */
  label: string;
}

/**
 * Run `operation`, retrying transient failures with bounded exponential backoff.
 *
 * Errors are classified on every failure; auth and unrecognized errors are thrown on the
 * first occurrence. When attempts run out the last TransientServiceError is thrown and the
 * caller escalates it to its stage's fatal kind.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { service, policy, label } = options;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (e) {
      const classified = classifyServiceError(e, service);
      if (!(classified instanceof TransientServiceError) || attempt >= maxAttempts) {
        throw classified;
      }
      const delay = backoffDelay(policy, attempt);
      console.warn(
        `[RETRY] ${label}: attempt ${attempt}/${maxAttempts} failed (${classified.message}); retrying in ${delay}ms`
      );
      await sleep(delay);
    }
  }
}

/**
 * Reject with `onTimeout()` if `promise` does not settle within `timeoutMs`.
 * The timer is always cleared so nothing is left running.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
