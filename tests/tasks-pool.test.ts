import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { TasksPool, type TaskRetryEvent } from '../src/tasks/tasks-pool.class.js';
import { HttpStatusError, TaskCancelledError } from '../src/errors.js';

describe('TasksPool', () => {
  it('should never run more tasks than its concurrency', async () => {
    const pool = new TasksPool({ concurrency: 2 });
    let active = 0;
    let peak = 0;

    const results = await Promise.all([1, 2, 3, 4, 5].map(n => pool.enqueue(async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(10);
      active--;
      return n * 10;
    })));

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
  });

  it('should retry transient failures with exponential backoff', async () => {
    const pool = new TasksPool({ retries: 2, retryDelay: 1, jitter: false });
    const retries: TaskRetryEvent[] = [];
    pool.on('pool:taskRetry', (event: TaskRetryEvent) => retries.push(event));
    let calls = 0;

    const value = await pool.enqueue(async ({ attempt }) => {
      calls++;
      if (attempt < 3) throw new HttpStatusError(503, 'https://api.example');
      return 'ok';
    }, { metadata: { collector: 'stub' } });

    expect(value).toBe('ok');
    expect(calls).toBe(3);
    expect(retries.map(event => [event.attempt, event.delayMs])).toEqual([[1, 1], [2, 2]]);
    expect(retries[0]?.metadata).toEqual({ collector: 'stub' });
  });

  it('should not retry permanent failures', async () => {
    const pool = new TasksPool({ retries: 2, retryDelay: 1 });
    let calls = 0;

    await expect(pool.enqueue(async () => {
      calls++;
      throw new HttpStatusError(401, 'https://api.example');
    })).rejects.toBeInstanceOf(HttpStatusError);
    expect(calls).toBe(1);
  });

  it('should stop after the last retry', async () => {
    const pool = new TasksPool({ retries: 1, retryDelay: 1 });
    let calls = 0;

    await expect(pool.enqueue(async () => {
      calls++;
      throw new HttpStatusError(502, 'https://api.example');
    })).rejects.toThrow('HTTP 502 from https://api.example');
    expect(calls).toBe(2);
  });

  it('should retry resolved values matched by retryWhen', async () => {
    const pool = new TasksPool({ retries: 2, retryDelay: 1 });
    const outcomes = ['NetworkError', 'Success'];
    let calls = 0;

    const value = await pool.enqueue(async () => outcomes[calls++], {
      retryWhen: outcome => outcome === 'NetworkError'
    });

    expect(value).toBe('Success');
    expect(calls).toBe(2);
  });

  it('should return the last value once retries run out', async () => {
    const pool = new TasksPool({ retries: 0 });
    const value = await pool.enqueue(async () => 'NetworkError', {
      retryWhen: outcome => outcome === 'NetworkError'
    });
    expect(value).toBe('NetworkError');
  });

  it('should skip a backoff that does not fit the budget', async () => {
    const pool = new TasksPool({ retries: 3, retryDelay: 100, jitter: false });
    let calls = 0;

    await expect(pool.enqueue(async () => {
      calls++;
      throw new HttpStatusError(503, 'https://api.example');
    }, { budget: () => 50 })).rejects.toBeInstanceOf(HttpStatusError);
    expect(calls).toBe(1);
  });

  it('should spread and cap the backoff', async () => {
    const pool = new TasksPool({ retries: 2, retryDelay: 4, maxRetryDelay: 6, random: () => 0 });
    const delays: number[] = [];
    pool.on('pool:taskRetry', (event: TaskRetryEvent) => delays.push(event.delayMs));

    await pool.enqueue(async ({ attempt }) => attempt, { retryWhen: attempt => attempt < 3 });

    // 4 * 0.5, then min(8 * 0.5, 6)
    expect(delays).toEqual([2, 4]);
  });

  it('should cancel queued tasks and abort running ones on stop', async () => {
    const pool = new TasksPool({ concurrency: 1, retries: 0 });

    const running = pool.enqueue(({ signal }) => new Promise<string>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    }));
    const queued = pool.enqueue(async () => 'never');

    pool.stop();

    await expect(running).rejects.toBeInstanceOf(TaskCancelledError);
    await expect(queued).rejects.toBeInstanceOf(TaskCancelledError);
    await expect(pool.enqueue(async () => 'late')).rejects.toBeInstanceOf(TaskCancelledError);
  });
});
