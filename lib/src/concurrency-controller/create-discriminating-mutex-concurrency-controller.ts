import { Mutex } from 'async-mutex';
import { ConcurrencyController } from './concurrency-controller';

/**
 * Use one mutex per discriminator: items with the same discriminator are
 * processed one after the other, items with different ones in parallel. A
 * mutex is dropped when nobody holds or waits for it anymore.
 * @param discriminator The discriminator to find or create a mutex for
 * @returns The controller to acquire and release the mutex for a specific discriminator
 */
export const createDiscriminatingMutexConcurrencyController = <T>(
  discriminator: (item: T) => string,
): ConcurrencyController<T> => {
  const mutexMap = new Map<string, { mutex: Mutex; users: number }>();
  return {
    acquire: async (item: T): Promise<() => void> => {
      const key = discriminator(item);
      const entry = mutexMap.get(key) ?? { mutex: new Mutex(), users: 0 };
      mutexMap.set(key, entry);
      entry.users++;
      const leave = () => {
        entry.users--;
        if (entry.users === 0 && mutexMap.get(key) === entry) {
          mutexMap.delete(key);
        }
      };
      try {
        const release = await entry.mutex.acquire();
        return () => {
          release();
          leave();
        };
      } catch (error) {
        leave();
        throw error;
      }
    },

    cancel: () => {
      for (const { mutex } of mutexMap.values()) {
        mutex.cancel();
      }
    },
  };
};
