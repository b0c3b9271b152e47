/**
 * Error handling utilities for external calls: retries, timeouts and stage wrapping
 */
import { ScanError, type ScanErrorCode, TimeoutError, isNodeError, isScanError, toError } from './types/errors.js';

export type RetryOptions = {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryableErrors?: string[];
  onRetry?: (error: Error, attempt: number) => void;
};

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableErrors: [
    'ECONNRESET',
    'ETIMEDOUT',
    'ENOTFOUND',
    'ECONNREFUSED',
    'ENETUNREACH',
    'EAI_AGAIN',
    'Could not resolve host',
    'Connection timed out',
    'The remote end hung up unexpectedly',
  ],
  onRetry: () => {},
};

/**
 * Determines if an error is retryable based on error code or message
 */
export function isRetryableError(error: Error, retryableErrors: string[]): boolean {
  if (error instanceof TimeoutError) return false;
  const errorCode = isNodeError(error) ? error.code : undefined;

  if (errorCode && retryableErrors.includes(errorCode)) {
    return true;
  }

  if (retryableErrors.includes(error.name)) {
    return true;
  }

  return retryableErrors.some((pattern) =>
    error.message.toLowerCase().includes(pattern.toLowerCase()),
  );
}

/**
 * Calculates delay for exponential backoff with jitter
 */
function calculateDelay(attempt: number, options: Required<RetryOptions>): number {
  const baseDelay = options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(baseDelay, options.maxDelayMs);
  // ±25% jitter
  const jitter = cappedDelay * 0.25 * (Math.random() - 0.5);
  return Math.floor(cappedDelay + jitter);
}

/**
 * Executes a function with automatic retry and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= opts.maxRetries + 1; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = toError(error);

      if (attempt > opts.maxRetries) {
        throw lastError;
      }

      if (!isRetryableError(lastError, opts.retryableErrors)) {
        throw lastError;
      }

      const delay = calculateDelay(attempt, opts);
      opts.onRetry(lastError, attempt);

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError || new Error('Retry failed');
}

/**
 * Runs `fn` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with a {@link TimeoutError} at that point even if `fn`
 * ignores the signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  timeoutError?: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(timeoutError || 'Operation timed out');
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([fn(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs one fallible stage of a job. Whatever `fn` throws leaves as a
 * {@link ScanError} carrying the code declared here; a ScanError raised
 * deeper keeps its own code.
 */
export async function stage<T>(code: ScanErrorCode, describe: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isScanError(error)) throw error;
    const err = toError(error);
    throw new ScanError(code, `${describe}: ${maskSecrets(err.message)}`, { cause: err });
  }
}

/**
 * Removes credentials from text that may echo a repository URL or token
 */
export function maskSecrets(text: string): string {
  return text
    .replace(/(\b[a-z][a-z0-9+.-]*:\/\/)[^/\s@]+@/gi, '$1***@') // userinfo in URLs
    .replace(/gh[pousr]_[a-zA-Z0-9]{30,}/g, '***REDACTED***') // GitHub tokens
    .replace(/glpat-[a-zA-Z0-9_-]{20,}/g, '***REDACTED***'); // GitLab tokens
}

/** 5000 -> "5 seconds", 1500 -> "1.5 seconds" */
export function formatSeconds(ms: number): string {
  return `${Math.round(ms) / 1000} seconds`;
}
