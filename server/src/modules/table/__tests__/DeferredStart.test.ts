import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DeferredStart } from '../DeferredStart.js';

describe('DeferredStart', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('指定時間後に1回だけ発火し、発火後は待機中でなくなる', () => {
    const start = new DeferredStart();
    const onFire = vi.fn();

    expect(start.arm(3000, onFire)).toBe(true);
    expect(start.isPending).toBe(true);

    vi.advanceTimersByTime(2999);
    expect(onFire).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledOnce();
    expect(start.isPending).toBe(false);
  });

  it('待機中の arm は無視され、最初の期限で発火する', () => {
    const start = new DeferredStart();
    const first = vi.fn();
    const second = vi.fn();

    start.arm(3000, first);
    vi.advanceTimersByTime(2000);
    expect(start.arm(3000, second)).toBe(false);

    vi.advanceTimersByTime(1000);
    expect(first).toHaveBeenCalledOnce();

    vi.advanceTimersByTime(5000);
    expect(second).not.toHaveBeenCalled();
  });

  it('cancel で発火せず、キャンセルしたかを返す', () => {
    const start = new DeferredStart();
    const onFire = vi.fn();

    start.arm(1000, onFire);
    expect(start.cancel()).toBe(true);
    expect(start.cancel()).toBe(false);
    expect(start.isPending).toBe(false);

    vi.advanceTimersByTime(2000);
    expect(onFire).not.toHaveBeenCalled();
  });

  it('キャンセル後は新しく arm できる', () => {
    const start = new DeferredStart();
    const stale = vi.fn();
    const fresh = vi.fn();

    start.arm(1000, stale);
    start.cancel();
    expect(start.arm(500, fresh)).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(stale).not.toHaveBeenCalled();
    expect(fresh).toHaveBeenCalledOnce();
  });

  it('発火後は次の開始のために再び arm できる', () => {
    const start = new DeferredStart();
    const onFire = vi.fn();

    start.arm(1000, onFire);
    vi.advanceTimersByTime(1000);
    expect(start.arm(1000, onFire)).toBe(true);
    vi.advanceTimersByTime(1000);

    expect(onFire).toHaveBeenCalledTimes(2);
  });
});
