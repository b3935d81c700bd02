import { describe, expect, it, vi } from 'vitest';

import type { LogEntry } from '../../types.js';

import { ShutdownController } from '../../shutdown-controller.js';

describe('ShutdownController', () => {
  it('runs cleanup newest first', async () => {
    const order: string[] = [];
    const controller = new ShutdownController();
    controller.register('telemetry', () => { order.push('telemetry'); });
    controller.register('transport', async () => { order.push('transport'); });

    await controller.shutdown();

    expect(order).toEqual(['transport', 'telemetry']);
  });

  it('runs only once across concurrent and later calls', async () => {
    const step = vi.fn();
    const controller = new ShutdownController();
    controller.register('once', step);

    await Promise.all([controller.shutdown(), controller.shutdown()]);
    await controller.shutdown();

    expect(step).toHaveBeenCalledTimes(1);
  });

  it('logs a failing step and continues with the rest', async () => {
    const logs: LogEntry[] = [];
    const order: string[] = [];
    const controller = new ShutdownController();
    controller.register('first', () => { order.push('first'); });
    controller.register('broken', () => { throw new Error('socket busy'); });

    await controller.shutdown({ logger: (e) => { logs.push(e); } });

    expect(order).toEqual(['first']);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      severity: 'WRN',
      remoteIdentifier: 'runner:shutdown',
      message: "cleanup 'broken' failed: socket busy",
    });
  });

  it('resolves without a logger when a step fails', async () => {
    const controller = new ShutdownController();
    controller.register('broken', () => Promise.reject(new Error('closed')));

    await expect(controller.shutdown()).resolves.toBeUndefined();
  });
});
