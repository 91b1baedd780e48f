import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { abortableSleep, MAX_TIMER_DELAY } from '../src/sleep.js';

describe('abortableSleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('settles a zero delay without a timer', async () => {
    const sleeping = abortableSleep(0);
    expect(vi.getTimerCount()).toBe(0);
    await expect(sleeping).resolves.toBeUndefined();
  });

  it('resolves once the delay elapses', async () => {
    let done = false;
    const sleeping = abortableSleep(500).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toBe(true);
    await sleeping;
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('gone'));
    await expect(abortableSleep(1000, controller.signal)).rejects.toThrow('gone');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('clears its timer when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const sleeping = abortableSleep(10_000, controller.signal);
    expect(vi.getTimerCount()).toBe(1);

    controller.abort(new Error('stop'));

    await expect(sleeping).rejects.toThrow('stop');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('honours delays longer than a single timer allows', async () => {
    const total = MAX_TIMER_DELAY + 5_000;
    let done = false;
    const sleeping = abortableSleep(total).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY);
    expect(done).toBe(false);
    expect(vi.getTimerCount()).toBe(1);

    await vi.advanceTimersByTimeAsync(4_999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toBe(true);
    await sleeping;
  });

  it('clears the current chunk when aborted after re-arming', async () => {
    const controller = new AbortController();
    const sleeping = abortableSleep(MAX_TIMER_DELAY * 2, controller.signal);
    const settled = expect(sleeping).rejects.toThrow('stop');

    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY + 1);
    expect(vi.getTimerCount()).toBe(1);

    controller.abort(new Error('stop'));

    await settled;
    expect(vi.getTimerCount()).toBe(0);
  });
});
