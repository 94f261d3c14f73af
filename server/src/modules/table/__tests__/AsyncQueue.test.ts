import { describe, it, expect } from 'vitest';
import { AsyncQueue } from '../AsyncQueue.js';

describe('AsyncQueue', () => {
  it('タスクを追加順に実行する', async () => {
    const queue = new AsyncQueue();
    const order: number[] = [];

    await Promise.all([
      queue.enqueue(async () => { order.push(1); }),
      queue.enqueue(async () => { order.push(2); }),
      queue.enqueue(async () => { order.push(3); }),
    ]);

    expect(order).toEqual([1, 2, 3]);
  });

  it('タスクの戻り値を取得できる', async () => {
    const queue = new AsyncQueue();
    await expect(queue.enqueue(async () => 'seated')).resolves.toBe('seated');
  });

  it('失敗したタスクの Promise だけが reject され、後続は実行される', async () => {
    const queue = new AsyncQueue();
    const order: number[] = [];

    const p1 = queue.enqueue(async () => { order.push(1); });
    const p2 = queue.enqueue(async () => { throw new Error('fail'); });
    const p3 = queue.enqueue(async () => { order.push(3); });

    await p1;
    await expect(p2).rejects.toThrow('fail');
    await p3;

    expect(order).toEqual([1, 3]);
  });

  it('前のタスクが await 中でも次のタスクは始まらない', async () => {
    const queue = new AsyncQueue();
    const order: string[] = [];

    await Promise.all([
      queue.enqueue(async () => {
        order.push('join-start');
        await new Promise(r => setTimeout(r, 20));
        order.push('join-end');
      }),
      queue.enqueue(async () => {
        order.push('leave-start');
        order.push('leave-end');
      }),
    ]);

    expect(order).toEqual(['join-start', 'join-end', 'leave-start', 'leave-end']);
  });

  it('size は実行中と待機中のタスク数を返す', async () => {
    const queue = new AsyncQueue();
    expect(queue.size).toBe(0);

    let release: () => void = () => {};
    const blocker = new Promise<void>(r => { release = r; });

    const p1 = queue.enqueue(() => blocker);
    expect(queue.size).toBe(1);

    const p2 = queue.enqueue(async () => {});
    expect(queue.size).toBe(2);

    release();
    await p1;
    await p2;
    await new Promise(r => setTimeout(r, 0));

    expect(queue.size).toBe(0);
  });
});
