import { createManualScheduler, createTimerScheduler } from './scheduler';
import { sleep } from './utils';

describe('Scheduler', () => {
  describe('createTimerScheduler', () => {
    it('should run the task repeatedly until it is stopped', async () => {
      // Arrange
      const onError = jest.fn();
      const task = jest.fn(async () => {});
      const stop = createTimerScheduler(onError).schedule(task, 10);

      // Act
      await sleep(100);
      await stop();
      const calls = task.mock.calls.length;
      await sleep(50);

      // Assert
      expect(calls).toBeGreaterThanOrEqual(2);
      expect(task).toHaveBeenCalledTimes(calls);
      expect(onError).not.toHaveBeenCalled();
    });

    it('should pass errors to the callback and keep running', async () => {
      // Arrange
      const error = new Error('tick failed');
      const onError = jest.fn();
      let ticks = 0;
      const stop = createTimerScheduler(onError).schedule(async () => {
        ticks++;
        throw error;
      }, 10);

      // Act
      await sleep(100);
      await stop();

      // Assert
      expect(ticks).toBeGreaterThanOrEqual(2);
      expect(onError).toHaveBeenCalledWith(error);
    });

    it('should wait for the running tick and abort its signal on stop', async () => {
      // Arrange
      let signal: AbortSignal | undefined;
      let finished = false;
      const stop = createTimerScheduler(jest.fn()).schedule(async (s) => {
        signal = s;
        await sleep(10_000, s);
        finished = true;
      }, 1);
      await sleep(50);

      // Act
      await stop();

      // Assert
      expect(signal?.aborted).toBe(true);
      expect(finished).toBe(true);
    });
  });

  describe('createManualScheduler', () => {
    it('should run the active tasks only on tick', async () => {
      // Arrange
      const scheduler = createManualScheduler();
      const first = jest.fn(async () => {});
      const second = jest.fn(async () => {});
      scheduler.schedule(first, 1000);
      const stopSecond = scheduler.schedule(second, 1000);

      // Act
      await scheduler.tick();
      await stopSecond();
      await scheduler.tick();

      // Assert
      expect(first).toHaveBeenCalledTimes(2);
      expect(second).toHaveBeenCalledTimes(1);
      expect(scheduler.activeSchedules).toBe(1);
    });
  });
});
