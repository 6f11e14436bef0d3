import { sleep } from '../common/utils';
import { ConcurrencyController } from './concurrency-controller';
import { createFullConcurrencyController } from './create-full-concurrency-controller';

const protectedAsyncFunction = async (
  controller: ConcurrencyController<string>,
  body: () => Promise<void>,
) => {
  const release = await controller.acquire('item');
  try {
    await body();
  } finally {
    release();
  }
};

describe('createFullConcurrencyController', () => {
  it('Executes tasks in parallel', async () => {
    // Arrange
    const controller = createFullConcurrencyController<string>();
    const task = async () => {
      await sleep(50);
    };
    const start = new Date().getTime();

    // Act: these will execute in parallel and should not wait for each other
    await Promise.all([
      protectedAsyncFunction(controller, task),
      protectedAsyncFunction(controller, task),
    ]);

    // Assert
    const diff = new Date().getTime() - start;
    expect(diff).toBeGreaterThanOrEqual(45);
    expect(diff).toBeLessThan(100);
  });

  it('Cancel has no effect', async () => {
    // Arrange
    const controller = createFullConcurrencyController<string>();
    const items: number[] = [];
    const task = (id: number) => async () => {
      await sleep(50);
      items.push(id);
    };

    // Act
    const first = protectedAsyncFunction(controller, task(1));
    const second = protectedAsyncFunction(controller, task(2));
    controller.cancel();
    await Promise.all([first, second]);

    // Assert
    expect(items.sort()).toEqual([1, 2]);
  });
});
