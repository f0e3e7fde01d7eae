import { describe, it, expect } from 'vitest';
import { ShutdownCoordinator } from '../shutdownCoordinator.js';

describe('ShutdownCoordinator', () => {
  it('runs operations in registration order', async () => {
    const order: string[] = [];
    const coordinator = new ShutdownCoordinator();
    coordinator.register('first', () => {
      order.push('first');
    });
    coordinator.register('second', async () => {
      order.push('second');
    });

    await expect(coordinator.shutdown('SIGTERM')).resolves.toBe(true);
    expect(order).toEqual(['first', 'second']);
  });

  it('keeps going when an operation fails', async () => {
    const order: string[] = [];
    const coordinator = new ShutdownCoordinator();
    coordinator.register('broken', () => {
      throw new Error('close failed');
    });
    coordinator.register('after', () => {
      order.push('after');
    });

    await expect(coordinator.shutdown()).resolves.toBe(true);
    expect(order).toEqual(['after']);
  });

  it('reports a timeout when operations hang', async () => {
    const coordinator = new ShutdownCoordinator(10);
    coordinator.register('hang', () => new Promise<void>(() => undefined));

    await expect(coordinator.shutdown()).resolves.toBe(false);
  });

  it('runs operations only once', async () => {
    let calls = 0;
    const coordinator = new ShutdownCoordinator();
    coordinator.register('count', () => {
      calls++;
    });

    await coordinator.shutdown();
    await coordinator.shutdown();

    expect(calls).toBe(1);
  });
});
