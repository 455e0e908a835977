import { DB_ERROR_CODES, isDbError } from "./errors";

export const UPSTREAM_RETRY_ATTEMPTS = 3;
export const UPSTREAM_RETRY_BASE_DELAY_MS = 100;

export type UpstreamRetryEvent = { attempt: number; delay_ms: number; error: unknown };

export type UpstreamRetryOptions = {
  attempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (input: UpstreamRetryEvent) => void;
};

let retryObserver: ((input: UpstreamRetryEvent) => void) | null = null;

/** Process-wide hook told about every retry; the host uses it for logging. */
export function registerUpstreamRetryObserver(
  observer: ((input: UpstreamRetryEvent) => void) | null,
): void {
  retryObserver = observer;
}

/**
 * Run a data-access call, retrying only when it failed with
 * DB_UPSTREAM_UNAVAILABLE. Delays double on every attempt.
 */
export async function withUpstreamRetry<T>(
  operation: () => Promise<T>,
  options: UpstreamRetryOptions = {},
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? UPSTREAM_RETRY_ATTEMPTS);
  const baseDelayMs = options.baseDelayMs ?? UPSTREAM_RETRY_BASE_DELAY_MS;
  const sleep = options.sleep ?? defaultSleep;

  let attempt = 1;
  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (!isDbError(error, DB_ERROR_CODES.UPSTREAM_UNAVAILABLE) || attempt >= attempts) {
        throw error;
      }
      const delayMs = baseDelayMs * 2 ** (attempt - 1);
      const event = { attempt, delay_ms: delayMs, error };
      options.onRetry?.(event);
      retryObserver?.(event);
      await sleep(delayMs);
      attempt += 1;
    }
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
