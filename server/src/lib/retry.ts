const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'timeout',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  onRetry?: (attempt: number, error: Error) => void;
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function getStatusCode(error: unknown): number | null {
  const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
  if (typeof status === 'number') return status;
  const responseStatus = readProperty(readProperty(error, 'response'), 'status');
  return typeof responseStatus === 'number' ? responseStatus : null;
}

function getErrorCode(error: unknown): string | null {
  const code = readProperty(error, 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

/**
 * Errors that flag themselves `retryable` (capability timeouts, unusable replies) are always
 * retried; otherwise fall back to HTTP status, socket codes and message text.
 */
export function isTransient(error: Error, rawError?: unknown): boolean {
  const candidate = rawError ?? error;
  if (readProperty(candidate, 'retryable') === true) return true;

  const status = getStatusCode(candidate);
  if (status != null && TRANSIENT_STATUSES.has(status)) return true;

  const code = getErrorCode(candidate);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Status text embedded in message ("Request failed with status 429")
  return /\b(408|425|429|500|502|503|504|529)\b/.test(msg);
}

/**
 * Retry-After header from an SDK error, in milliseconds (0 when absent).
 */
function getRetryAfterMs(error: unknown): number {
  const headers = readProperty(error, 'headers') ?? readProperty(readProperty(error, 'response'), 'headers');
  let retryAfter: string | null = null;
  if (headers instanceof Headers) {
    retryAfter = headers.get('retry-after');
  } else if (typeof headers === 'object' && headers !== null) {
    const raw = readProperty(headers, 'retry-after');
    retryAfter = typeof raw === 'string' ? raw : null;
  }
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    return Math.min(seconds, 60) * 1000;
  }
  return 0;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isTransient(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}
