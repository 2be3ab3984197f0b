/**
 * Retry helper for backend stream establishment
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

/**
 * Three attempts, fixed one second apart
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 1000,
  multiplier: 1,
  timeoutMs: 120000,
};

export const NO_RETRY_CONFIG: RetryConfig = {
  ...DEFAULT_RETRY_CONFIG,
  maxAttempts: 1,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  /** Only errors for which this returns true are retried */
  shouldRetry?: (error: unknown) => boolean;
  onLog?: (log: RetryLog) => void;
  /** Stops further attempts once aborted, and aborts the running one */
  signal?: AbortSignal;
  /** Builds the error thrown when an attempt exceeds timeoutMs */
  onTimeout?: (timeoutMs: number) => Error;
}

/**
 * Executes a function with retry and per-attempt timeout.
 *
 * `fn` is called from scratch on every attempt. Each attempt gets its own
 * signal, aborted when the attempt fails or times out and, for the attempt
 * that succeeds, when `options.signal` aborts. The error of the last
 * attempt is rethrown unchanged, as is any error `shouldRetry` rejects.
 *
 * @param fn - Async function to execute, receives the 1-based attempt number and the attempt signal
 * @param config - Retry configuration
 * @returns Promise with the function result
 */
export async function withRetry<T>(
  fn: (attempt: number, signal: AbortSignal) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { shouldRetry = () => true, onLog, signal, onTimeout } = options;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    const attemptController = linkedController(signal);
    try {
      const result = await withTimeout(fn(attempt, attemptController.signal), config.timeoutMs, onTimeout);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      // A timed out request is still open
      attemptController.abort();

      const retryable =
        attempt < config.maxAttempts && shouldRetry(error) && !(signal?.aborted ?? false);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: retryable ? lastDelay : undefined,
      });

      if (!retryable) {
        throw error;
      }

      await sleep(lastDelay);
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }
}

function linkedController(parent?: AbortSignal): AbortController {
  const controller = new AbortController();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', () => controller.abort(), { once: true });
  }
  return controller;
}

/**
 * Race a promise against a timer that is always cleared
 */
function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout?: (timeoutMs: number) => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(onTimeout ? onTimeout(timeoutMs) : new Error(`Timeout after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  return Promise.race([promise, timeoutPromise]).finally(() => clearTimeout(timer));
}

/**
 * Sleep utility function
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create structured error log in JSON format
 */
export function createErrorLog(log: RetryLog, modelName: string) {
  return {
    timestamp: log.timestamp.toISOString(),
    attempt: log.attempt,
    model: modelName,
    error: log.error,
    next_retry_in_ms: log.nextRetryInMs,
    severity: log.attempt >= 3 ? 'HIGH' : 'MEDIUM',
  };
}
