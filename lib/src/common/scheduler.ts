/**
 * A recurring task. The signal is aborted when the schedule is stopped so
 * that long running work can end at its next I/O boundary.
 */
export interface ScheduledTask {
  (signal: AbortSignal): Promise<void>;
}

/**
 * Runs a task repeatedly until it is stopped. A stopped schedule resolves
 * once the currently running tick finished.
 */
export interface Scheduler {
  schedule(
    task: ScheduledTask,
    intervalInMs: number,
  ): () => Promise<void>;
}

/**
 * A scheduler based on timers. The next tick is planned only after the
 * previous tick finished so that ticks of one schedule never overlap.
 * Errors of a tick are passed to the `onError` callback and do not stop the
 * schedule.
 */
export const createTimerScheduler = (
  onError: (error: unknown) => void,
): Scheduler => ({
  schedule(task: ScheduledTask, intervalInMs: number) {
    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    let running: Promise<void> = Promise.resolve();

    const tick = () => {
      running = task(controller.signal)
        .catch(onError)
        .finally(() => {
          if (!controller.signal.aborted) {
            timeout = setTimeout(tick, intervalInMs);
          }
        });
    };
    timeout = setTimeout(tick, intervalInMs);

    return async () => {
      controller.abort();
      clearTimeout(timeout);
      await running;
    };
  },
});

export interface ManualScheduler extends Scheduler {
  /** Runs one tick of every active schedule and waits for them. */
  tick(): Promise<void>;
  /** The number of schedules that were not stopped yet. */
  readonly activeSchedules: number;
}

/**
 * A scheduler that only runs a tick when `tick` is called. Useful when the
 * surrounding application already has its own loop and in tests.
 */
export const createManualScheduler = (): ManualScheduler => {
  const tasks = new Map<ScheduledTask, AbortController>();
  return {
    schedule(task: ScheduledTask) {
      const controller = new AbortController();
      tasks.set(task, controller);
      return async () => {
        controller.abort();
        tasks.delete(task);
      };
    },
    async tick() {
      await Promise.all(
        Array.from(tasks.entries()).map(([task, controller]) =>
          task(controller.signal),
        ),
      );
    },
    get activeSchedules() {
      return tasks.size;
    },
  };
};
