/**
 * Retry logic with exponential backoff for AI and search backend calls.
 *
 * - Exponential backoff with jitter
 * - Honors "Retry-After" hints embedded in error messages
 * - Only retries on retryable errors (429, 5xx, network)
 */

export interface RetryOptions {
  maxRetries?: number;         // default: 3
  initialDelayMs?: number;     // default: 1000
  maxDelayMs?: number;         // default: 30000
  backoffMultiplier?: number;  // default: 2
  retryableErrors?: number[];  // HTTP status codes to retry (default: [429, 500, 502, 503, 504])
  onRetry?: (error: Error, attempt: number) => void;
  /** Custom retryable check. Return true to retry, false to not, undefined to fall through to defaults. */
  isRetryable?: (error: Error) => boolean | undefined;
}

export class RetryableError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public retryAfterMs?: number
  ) {
    super(message);
    this.name = 'RetryableError';
  }
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry' | 'isRetryable'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableErrors: [429, 500, 502, 503, 504],
};

const NETWORK_ERROR_MARKERS = ['fetch failed', 'due to timeout', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND'];

/**
 * Execute a function with retry logic.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxRetries || !isRetryableError(error, opts.retryableErrors, options.isRetryable)) {
        throw error;
      }

      const retryAfterMs = extractRetryAfter(error);
      const baseDelay = retryAfterMs ?? calculateBackoff(attempt, opts.initialDelayMs, opts.backoffMultiplier);
      const delayMs = Math.min(addJitter(baseDelay), opts.maxDelayMs);

      if (options.onRetry && error instanceof Error) {
        options.onRetry(error, attempt + 1);
      }

      await sleep(delayMs);
    }
  }
}

/**
 * Check if an error is retryable.
 */
function isRetryableError(
  error: unknown,
  retryableStatuses: number[],
  customCheck?: (error: Error) => boolean | undefined,
): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (customCheck) {
    const result = customCheck(error);
    if (result !== undefined) return result;
  }

  if (error instanceof RetryableError) {
    return true;
  }

  const statusCode = readStatusCode(error);
  if (statusCode !== undefined) {
    return retryableStatuses.includes(statusCode);
  }

  return NETWORK_ERROR_MARKERS.some((marker) => error.message.includes(marker));
}

/**
 * Status code from a `statusCode` property or an "(NNN)" marker in the
 * message, e.g. "OpenRouter API error (429): ...".
 */
function readStatusCode(error: Error): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  const statusMatch = error.message.match(/\((\d{3})\)/);
  return statusMatch ? parseInt(statusMatch[1], 10) : undefined;
}

/**
 * Extract a Retry-After value in milliseconds from an error.
 */
function extractRetryAfter(error: unknown): number | undefined {
  if (error instanceof RetryableError && error.retryAfterMs !== undefined) {
    return error.retryAfterMs;
  }
  if (!(error instanceof Error)) {
    return undefined;
  }

  // "Retry-After: 5" or "retry after 5 seconds"
  const retryAfterMatch = error.message.match(/retry[- ]after[:\s]+(\d+)/i);
  return retryAfterMatch ? parseInt(retryAfterMatch[1], 10) * 1000 : undefined;
}

function calculateBackoff(attempt: number, initialDelayMs: number, multiplier: number): number {
  return initialDelayMs * Math.pow(multiplier, attempt);
}

/**
 * Returns a value between 0.5x and 1.5x the input.
 */
function addJitter(delayMs: number): number {
  const jitterFactor = 0.5 + Math.random();
  return Math.floor(delayMs * jitterFactor);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
