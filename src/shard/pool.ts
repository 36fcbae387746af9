import { OperationCancelledError } from '../errors/types';
import { validateConcurrency } from '../utils/validation';

export type PoolWorker<T> = (index: number) => Promise<T>;

/**
 * Run `worker` for every index in 0..count-1 with at most `concurrency`
 * in flight. Each result lands in its own slot of a fixed-size array, so
 * workers never touch each other's state.
 *
 * After the first failure no new index is started; in-flight workers are
 * allowed to settle before the first error is rethrown.
 */
export async function runWorkerPool<T>(
  count: number,
  concurrency: number,
  worker: PoolWorker<T>,
  signal?: AbortSignal,
  operation: string = 'Operation'
): Promise<T[]> {
  validateConcurrency(concurrency);

  const slots = new Array<T | undefined>(count).fill(undefined);
  let nextIndex = 0;
  let firstError: unknown = null;

  const runLoop = async (): Promise<void> => {
    while (firstError === null && nextIndex < count) {
      if (signal?.aborted) {
        firstError = new OperationCancelledError(operation);
        return;
      }

      const index = nextIndex++;
      try {
        slots[index] = await worker(index);
      } catch (error) {
        if (firstError === null) {
          firstError = error;
        }
      }
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, count) }, () => runLoop());
  await Promise.all(workers);

  if (firstError === null && signal?.aborted) {
    firstError = new OperationCancelledError(operation);
  }
  if (firstError !== null) {
    throw firstError;
  }

  // Every slot is filled once all loops finish without error
  return slots.map((slot, index) => {
    if (slot === undefined) {
      throw new Error(`Worker pool slot ${index} was never filled`);
    }
    return slot;
  });
}
