import { logger } from './logger';
import { NetworkError, getErrorMessage } from './errors';

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
}

export interface FetchRetryOptions extends Partial<RetryOptions> {
  /** Per-attempt timeout; each attempt gets a fresh abort signal. */
  timeoutMs?: number;
}

const defaultRetryOptions: RetryOptions = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMultiplier: 2,
  shouldRetry: (error) => {
    if (error instanceof Error) {
      // Don't retry on client errors (4xx)
      if ('status' in error && typeof error.status === 'number') {
        return error.status >= 500;
      }
    }
    return true;
  }
};

export async function retryAsync<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultRetryOptions, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      const result = await fn();
      if (attempt > 1) {
        logger.info('Operation succeeded after retry', { component: 'retry', attempt, maxAttempts: opts.maxAttempts });
      }
      return result;
    } catch (error) {
      lastError = error;

      if (attempt === opts.maxAttempts) {
        break;
      }

      logger.warn('Operation failed, considering retry', {
        component: 'retry',
        attempt,
        maxAttempts: opts.maxAttempts,
        error: getErrorMessage(error)
      });

      if (!opts.shouldRetry?.(error)) {
        logger.info('Skipping retry due to shouldRetry condition', {
          component: 'retry',
          error: getErrorMessage(error)
        });
        break;
      }

      const delay = opts.delayMs * Math.pow(opts.backoffMultiplier || 2, attempt - 1);
      logger.debug('Waiting before retry', { component: 'retry', delay, attempt });

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

// fetch rejects with a DOMException when its signal fires
function isAbort(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof NetworkError && typeof error.context?.status === 'number') {
    return error.context.status;
  }
  return undefined;
}

export async function fetchWithRetry(
  url: string,
  options: RequestInit = {},
  retryOptions: FetchRetryOptions = {}
): Promise<Response> {
  const { timeoutMs, ...retry } = retryOptions;

  return retryAsync(async () => {
    try {
      const response = await fetch(url, {
        ...options,
        ...(timeoutMs !== undefined && { signal: AbortSignal.timeout(timeoutMs) }),
      });

      if (!response.ok) {
        throw new NetworkError(`HTTP ${response.status}: ${response.statusText}`, {
          url,
          status: response.status,
          statusText: response.statusText
        });
      }

      return response;
    } catch (error) {
      if (isAbort(error)) {
        throw new NetworkError(
          timeoutMs !== undefined ? `Request timed out after ${timeoutMs}ms` : 'Request aborted',
          { url, timeoutMs }
        );
      }
      if (error instanceof TypeError) {
        throw new NetworkError(`Network error: ${error.message}`, { url });
      }
      throw error;
    }
  }, {
    shouldRetry: (error) => {
      // Retry on server errors, rate limits and network issues; never on other 4xx
      const status = statusOf(error);
      if (status !== undefined) {
        return status >= 500 || status === 429;
      }
      return true;
    },
    ...retry
  });
}
