import { Semaphore } from 'async-mutex';
import { ConcurrencyController } from './concurrency-controller';

/**
 * Uses a semaphore to process up to a given amount of items in parallel. Any
 * additional item waits until a currently processed item finishes.
 * @returns The controller to acquire and release the semaphore and to cancel all waiting acquires
 */
export const createSemaphoreConcurrencyController = <T>(
  maxParallel: number,
): ConcurrencyController<T> => {
  const semaphore = new Semaphore(maxParallel);
  return {
    acquire: async () => {
      const [, release] = await semaphore.acquire();
      return release;
    },
    cancel: () => semaphore.cancel(),
  };
};
