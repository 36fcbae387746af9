import pRetry, { AbortError } from 'p-retry';
import { types } from 'util';
import { AppError, OperationCancelledError, isErrnoException } from '../errors/types';

export interface RetryOptions {
  maxRetries?: number;
  minTimeout?: number;
  maxTimeout?: number;
  signal?: AbortSignal;
  onRetry?: (error: Error, attempt: number) => void;
}

const TRANSIENT_CODES = new Set(['EAGAIN', 'EBUSY', 'EMFILE', 'ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN']);

/**
 * Whether a failed blob store is worth another attempt
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isRecoverable;
  }
  if (isErrnoException(error) && error.code !== undefined) {
    return TRANSIENT_CODES.has(error.code);
  }
  return true;
}

/**
 * Retry a function with exponential backoff
 */
export async function retryOperation<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    minTimeout = 1000,
    maxTimeout = 10000,
    signal,
    onRetry,
  } = options;

  return pRetry(
    async () => {
      if (signal?.aborted) {
        throw new AbortError(new OperationCancelledError('Publishing'));
      }

      try {
        return await operation();
      } catch (error) {
        if (!isRetryable(error)) {
          throw new AbortError(types.isNativeError(error) ? error : String(error));
        }
        throw error;
      }
    },
    {
      retries: maxRetries,
      minTimeout,
      maxTimeout,
      onFailedAttempt: (failure) => {
        if (onRetry && failure.retriesLeft > 0) {
          onRetry(failure, failure.attemptNumber);
        }
      },
    }
  );
}
