/**
 * Supervised Task Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { SupervisedTask } from '../../src/core/sync/supervised-task.js';
import { createLogger } from '../../src/observability/logger.js';
import { deferred, waitFor } from '../helpers/fake-hub.js';

const logger = createLogger({ component: 'test' });

describe('SupervisedTask', () => {
  it('should not start a second run while one is active', () => {
    const gate = deferred<void>();
    const task = new SupervisedTask('worker', () => gate.promise, logger);

    expect(task.restart()).toBe(true);
    expect(task.restart()).toBe(false);
    expect(task.runCount).toBe(1);

    gate.resolve();
  });

  it('should clear the run once it exits', async () => {
    const task = new SupervisedTask('worker', async () => {}, logger);

    task.restart();
    await waitFor(() => !task.isRunning());

    expect(task.restart()).toBe(true);
    expect(task.runCount).toBe(2);
  });

  it('should treat a run that throws as exited', async () => {
    const task = new SupervisedTask(
      'worker',
      async () => {
        throw new Error('body failed');
      },
      logger
    );

    task.restart();
    await waitFor(() => !task.isRunning());

    expect(task.restart()).toBe(true);
  });

  it('should stop a run that watches the signal', async () => {
    const task = new SupervisedTask(
      'worker',
      (signal) =>
        new Promise<void>((resolve) => {
          signal.addEventListener('abort', () => resolve());
        }),
      logger
    );
    task.restart();

    await task.stop();

    expect(task.isRunning()).toBe(false);
  });

  it('should keep a run that outlives the grace period until it settles', async () => {
    const gate = deferred<void>();
    const task = new SupervisedTask('worker', () => gate.promise, logger);
    task.restart();

    await task.stop(10);

    expect(task.isRunning()).toBe(true);
    expect(task.restart()).toBe(false);
    expect(task.runCount).toBe(1);

    gate.resolve();
    await waitFor(() => !task.isRunning());

    expect(task.restart()).toBe(true);
    expect(task.runCount).toBe(2);
  });
});
