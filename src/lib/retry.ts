import { sleep } from './abort.js';

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'temporarily unavailable',
  'timed out',
  'socket hang up',
  'fetch failed',
  'service unavailable',
  'bad gateway',
];

const MAX_RETRY_AFTER_MS = 60_000;

function readNumberField(source: unknown, key: string): number | null {
  if (typeof source !== 'object' || source === null) return null;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  return readNumberField(error, 'status') ?? readNumberField(error, 'statusCode');
}

function getErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null) return null;
  const direct: unknown = Reflect.get(error, 'code');
  if (typeof direct === 'string') return direct.toUpperCase();
  // fetch() wraps socket failures: TypeError('fetch failed', { cause: { code } })
  const cause: unknown = Reflect.get(error, 'cause');
  return cause === error ? null : getErrorCode(cause);
}

export function isTransient(error: Error, rawError?: unknown): boolean {
  const candidate = rawError ?? error;
  const status = getStatusCode(candidate);
  if (status != null) return TRANSIENT_STATUSES.has(status);

  const code = getErrorCode(candidate);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Retry-After delay in milliseconds from an error carrying response headers,
 * or 0 when absent.
 */
function getRetryAfterMs(error: unknown): number {
  if (typeof error !== 'object' || error === null) return 0;
  const headers: unknown = Reflect.get(error, 'headers');
  if (!(headers instanceof Headers)) return 0;
  const retryAfter = headers.get('retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
  }
  return 0;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error) => void;
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

      if (attempt >= maxAttempts || options?.signal?.aborted || !isTransient(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await sleep(delay, options?.signal);
      if (options?.signal?.aborted) {
        throw lastError;
      }
    }
  }

  throw lastError ?? new Error('withRetry: no attempts made');
}
