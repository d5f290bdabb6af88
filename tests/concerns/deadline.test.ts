import { describe, it, expect } from 'vitest';
import { getEventListeners } from 'node:events';
import { Deadline } from '../../src/concerns/deadline.js';
import { DeadlineExceededError } from '../../src/errors.js';

describe('Deadline', () => {
  it('should expire after the given time', async () => {
    const deadline = Deadline.after(20);
    expect(deadline.expired).toBe(false);

    await deadline.whenExpired();

    expect(deadline.expired).toBe(true);
    expect(deadline.signal.reason).toBeInstanceOf(DeadlineExceededError);
  });

  it('should report remaining time against its clock', () => {
    let now = 0;
    const deadline = Deadline.after(100, { now: () => now });

    now = 40;
    expect(deadline.remaining()).toBe(60);

    now = 200;
    expect(deadline.remaining()).toBe(0);
    expect(deadline.expired).toBe(true);
    deadline.dispose();
  });

  it('should cap a child at the parent expiry', () => {
    const parent = Deadline.after(50);

    const long = parent.child(1000);
    expect(long.capped).toBe(true);
    expect(long.deadline.at).toBe(parent.at);

    const short = parent.child(10);
    expect(short.capped).toBe(false);
    expect(short.deadline.at).toBeLessThan(parent.at);

    long.deadline.dispose();
    short.deadline.dispose();
    parent.dispose();
  });

  it('should expire children when the parent is aborted', () => {
    const parent = Deadline.after(1000);
    const { deadline } = parent.child(500);

    parent.abort();

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.expired).toBe(true);
  });

  it('should start expired under an aborted signal and keep its reason', () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    const deadline = Deadline.after(1000, { parent: controller.signal });

    expect(deadline.expired).toBe(true);
    expect(deadline.signal.reason).toBeInstanceOf(Error);
    expect(deadline.signal.reason instanceof Error && deadline.signal.reason.message).toBe('stop');
  });

  it('should keep one abort listener however often expiry is awaited', async () => {
    const deadline = Deadline.after(1000);

    const waits = Array.from({ length: 12 }, () => deadline.whenExpired());

    expect(new Set(waits).size).toBe(1);
    expect(getEventListeners(deadline.signal, 'abort')).toHaveLength(1);

    deadline.abort();
    await Promise.all(waits);
    expect(getEventListeners(deadline.signal, 'abort')).toHaveLength(0);
  });
});
