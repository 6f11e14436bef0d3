/**
 * A concurrency controller that defines how concurrency must be handled when
 * processing items: in parallel and/or sequentially or use some other logic.
 */
export interface ConcurrencyController<T> {
  /** Acquire a lock (if any) and return a function to release it. */
  acquire(item: T): Promise<() => void>;

  /** Cancel all pending locks. The waiting `acquire` calls are rejected. */
  cancel(): void;
}
