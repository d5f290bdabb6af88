import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { SerialQueue } from '../../src/concerns/serial-queue.js';

describe('SerialQueue', () => {
  it('should run jobs one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const order: string[] = [];

    const slow = queue.run(async () => {
      await sleep(20);
      order.push('slow');
      return 1;
    });
    const fast = queue.run(() => {
      order.push('fast');
      return 2;
    });

    expect(queue.size).toBe(2);
    await expect(Promise.all([slow, fast])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['slow', 'fast']);
    expect(queue.size).toBe(0);
  });

  it('should keep going after a failing job', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(() => {
      throw new Error('broken');
    });
    const next = queue.run(() => 'ok');

    await expect(failing).rejects.toThrow('broken');
    await expect(next).resolves.toBe('ok');
    await queue.idle();
    expect(queue.size).toBe(0);
  });
});
