/**
 * Exponential backoff retry with jitter for storage calls.
 *
 * Only transient failures are retried: network resets, throttling (429)
 * and server-side errors (5xx) reported by the storage API.
 */

export interface RetryOptions {
  /** Maximum number of retry attempts. */
  readonly maxRetries: number;
  /** Initial delay in ms before first retry. */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. */
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 250,
  maxDelayMs: 5_000,
};

const TRANSIENT_MESSAGE_MARKERS = [
  "econnrefused",
  "econnreset",
  "etimedout",
  "epipe",
  "eai_again",
  "socket hang up",
  "fetch failed",
  "network",
];

/** Numeric status carried by storage API errors (`err.code` or `err.status`). */
function statusOf(err: Error): number | null {
  for (const field of ["code", "status"] as const) {
    const value: unknown = Reflect.get(err, field);
    if (typeof value === "number") return value;
  }
  return null;
}

/** Check if an error is transient and worth retrying. */
export function isTransient(err: unknown): boolean {
  if (!(err instanceof Error)) return false;

  const status = statusOf(err);
  if (status !== null) {
    return status === 408 || status === 429 || (status >= 500 && status < 600);
  }

  const msg = err.message.toLowerCase();
  return TRANSIENT_MESSAGE_MARKERS.some((marker) => msg.includes(marker));
}

/**
 * Execute a function with exponential backoff retry.
 * Only retries on transient errors.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts?: Partial<RetryOptions>,
): Promise<T> {
  const options = { ...DEFAULT_RETRY_OPTIONS, ...opts };
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;

      if (!isTransient(err)) {
        throw err;
      }

      if (attempt >= options.maxRetries) {
        break;
      }

      const exponentialDelay = options.baseDelayMs * Math.pow(2, attempt);
      const jitter = Math.random() * options.baseDelayMs;
      const delay = Math.min(exponentialDelay + jitter, options.maxDelayMs);

      await sleep(delay);
    }
  }

  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
