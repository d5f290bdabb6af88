import { DeadlineExceededError } from '../errors.js';

export interface DeadlineOptions {
  /** Aborting the parent expires this deadline too. */
  parent?: AbortSignal;
  now?: () => number;
}

function reasonOf(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new DeadlineExceededError('Cancelled');
}

/**
 * An absolute expiry time paired with the abort signal that fires at it.
 * Call `dispose()` once the guarded work is over to release the timer.
 */
export class Deadline {
  readonly at: number;
  readonly signal: AbortSignal;
  private readonly controller: AbortController;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private unlink: (() => void) | null = null;
  private expiry: Promise<void> | null = null;

  constructor(at: number, options: DeadlineOptions = {}) {
    this.at = at;
    this.now = options.now ?? Date.now;
    this.controller = new AbortController();
    this.signal = this.controller.signal;

    const { parent } = options;
    if (parent) {
      if (parent.aborted) {
        this.controller.abort(reasonOf(parent));
        return;
      }
      const onParentAbort = (): void => this.abort(reasonOf(parent));
      parent.addEventListener('abort', onParentAbort, { once: true });
      this.unlink = () => parent.removeEventListener('abort', onParentAbort);
    }

    const remaining = this.remaining();
    if (remaining <= 0) {
      this.abort(new DeadlineExceededError());
    } else {
      this.timer = setTimeout(() => this.abort(new DeadlineExceededError()), remaining);
    }
  }

  static after(ms: number, options: DeadlineOptions = {}): Deadline {
    const now = options.now ?? Date.now;
    return new Deadline(now() + Math.max(0, ms), options);
  }

  /**
   * A nested deadline at most `ms` away that also expires with this one.
   * `capped` tells whether this deadline, not `ms`, decided the expiry.
   */
  child(ms: number): { deadline: Deadline; capped: boolean } {
    const requested = this.now() + Math.max(0, ms);
    const capped = this.at <= requested;
    const deadline = new Deadline(capped ? this.at : requested, { parent: this.signal, now: this.now });
    return { deadline, capped };
  }

  remaining(): number {
    return Math.max(0, this.at - this.now());
  }

  get expired(): boolean {
    return this.signal.aborted || this.remaining() <= 0;
  }

  /**
   * Resolves once the deadline expires or is cancelled. Every caller shares
   * one promise, so the signal carries at most one listener for it.
   */
  whenExpired(): Promise<void> {
    if (this.signal.aborted) return Promise.resolve();
    if (!this.expiry) {
      this.expiry = new Promise(resolve => {
        this.signal.addEventListener('abort', () => resolve(), { once: true });
      });
    }
    return this.expiry;
  }

  abort(reason: Error = new DeadlineExceededError()): void {
    this.release();
    if (!this.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  dispose(): void {
    this.release();
  }

  private release(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.unlink?.();
    this.unlink = null;
  }
}
