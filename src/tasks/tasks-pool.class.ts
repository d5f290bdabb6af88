import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import { ErrorClassifier } from '../concerns/error-classifier.js';
import { idGenerator } from '../concerns/id.js';
import { TaskCancelledError } from '../errors.js';
import { FifoTaskQueue } from './concerns/fifo-task-queue.js';

export interface TaskContext {
  /** 1-based attempt number. */
  attempt: number;
  /** Aborted when the pool is stopped. */
  signal: AbortSignal;
}

export type TaskFunction<T> = (context: TaskContext) => Promise<T>;

export interface TaskPoolOptions {
  concurrency?: number;
  retries?: number;
  /** Base backoff in ms, doubled after every attempt. */
  retryDelay?: number;
  maxRetryDelay?: number;
  /** Spread each backoff uniformly over ±50 %. */
  jitter?: boolean;
  random?: () => number;
}

export interface EnqueueOptions<T> {
  retries?: number;
  /** Retry when the task resolved with a value that still counts as a transient failure. */
  retryWhen?: (value: T) => boolean;
  /** Milliseconds the task may still spend; a backoff that would not fit is skipped. */
  budget?: () => number;
  metadata?: Record<string, unknown>;
}

export interface TaskRetryEvent {
  id: string;
  attempt: number;
  delayMs: number;
  metadata: Record<string, unknown>;
}

interface PoolTask {
  id: string;
  metadata: Record<string, unknown>;
  controller: AbortController;
  execute(): Promise<void>;
  cancel(error: Error): void;
}

/**
 * Bounded-concurrency task pool. Tasks start in FIFO order; each one is
 * retried with exponential backoff while it fails transiently and its
 * budget allows another wait.
 */
export class TasksPool extends EventEmitter {
  public readonly concurrency: number;
  public readonly retries: number;
  public readonly retryDelay: number;
  public readonly maxRetryDelay: number;
  public readonly jitter: boolean;
  public stopped: boolean;

  private queue: FifoTaskQueue<PoolTask>;
  private active: Set<PoolTask>;
  private random: () => number;

  constructor(options: TaskPoolOptions = {}) {
    super();
    this.concurrency = this._normalizeConcurrency(options.concurrency ?? 8);
    this.retries = Math.max(0, options.retries ?? 2);
    this.retryDelay = Math.max(0, options.retryDelay ?? 250);
    this.maxRetryDelay = Math.max(0, options.maxRetryDelay ?? 10000);
    this.jitter = options.jitter ?? true;
    this.random = options.random ?? Math.random;
    this.stopped = false;
    this.queue = new FifoTaskQueue<PoolTask>();
    this.active = new Set();
  }

  enqueue<T>(fn: TaskFunction<T>, options: EnqueueOptions<T> = {}): Promise<T> {
    const id = idGenerator();
    if (this.stopped) {
      return Promise.reject(new TaskCancelledError(id));
    }

    return new Promise<T>((resolve, reject) => {
      const task: PoolTask = {
        id,
        metadata: { ...options.metadata },
        controller: new AbortController(),
        execute: async () => {
          try {
            resolve(await this._executeTaskWithRetry(task, fn, options));
          } catch (error: unknown) {
            reject(error instanceof Error ? error : new Error(String(error)));
          }
        },
        cancel: (error: Error) => reject(error)
      };

      this.queue.enqueue(task);
      this.processNext();
    });
  }

  processNext(): void {
    while (!this.stopped && this.queue.length > 0 && this.active.size < this.concurrency) {
      const task = this.queue.dequeue();
      if (!task) break;

      this.active.add(task);

      void task.execute().finally(() => {
        this.active.delete(task);
        this.processNext();
      });
    }
  }

  /**
   * Rejects every queued task with TaskCancelledError and aborts the signal
   * of the running ones. Tasks that already settled are not affected.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;

    this.queue.flush((task) => {
      task.cancel(new TaskCancelledError(task.id));
    });

    for (const task of this.active) {
      task.controller.abort(new TaskCancelledError(task.id));
    }
  }

  private async _executeTaskWithRetry<T>(task: PoolTask, fn: TaskFunction<T>, options: EnqueueOptions<T>): Promise<T> {
    const retries = Math.max(0, options.retries ?? this.retries);

    for (let attempt = 0; ; attempt++) {
      const context: TaskContext = {
        attempt: attempt + 1,
        signal: task.controller.signal
      };

      let value: T;
      try {
        value = await fn(context);
      } catch (error: unknown) {
        if (attempt >= retries || !ErrorClassifier.isRetriable(error)) {
          throw error;
        }
        if (!(await this._backoff(task, attempt, options.budget))) {
          throw error;
        }
        continue;
      }

      if (attempt >= retries || !options.retryWhen?.(value)) {
        return value;
      }
      if (!(await this._backoff(task, attempt, options.budget))) {
        return value;
      }
    }
  }

  /** Waits before the next attempt; false when the wait does not fit the budget. */
  private async _backoff(task: PoolTask, attempt: number, budget?: () => number): Promise<boolean> {
    const delayMs = this._computeRetryDelay(attempt);
    if (budget && delayMs >= budget()) {
      return false;
    }

    const event: TaskRetryEvent = {
      id: task.id,
      attempt: attempt + 1,
      delayMs,
      metadata: task.metadata
    };
    this._safeEmit('pool:taskRetry', event);

    await delay(delayMs, undefined, { signal: task.controller.signal });
    return true;
  }

  private _computeRetryDelay(attempt: number): number {
    let delayMs = this.retryDelay * Math.pow(2, attempt);
    if (this.jitter) {
      delayMs = delayMs * (0.5 + this.random());
    }
    return Math.round(Math.min(delayMs, this.maxRetryDelay));
  }

  private _normalizeConcurrency(concurrency: number): number {
    if (!Number.isFinite(concurrency) || concurrency < 1) {
      return 1;
    }
    return Math.floor(concurrency);
  }

  private _safeEmit(event: string, ...args: unknown[]): void {
    if (this.listenerCount(event) === 0) {
      return;
    }
    this.emit(event, ...args);
  }
}
