import { describe, test, expect } from 'vitest';

import { createReplyQueue } from '../../server/reply-queue.js';

interface Gate {
  readonly promise: Promise<void>;
  open(): void;
}

function createGate(): Gate {
  let open: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}

describe('ReplyQueue', () => {
  test('runs jobs immediately below the concurrency limit', async () => {
    const queue = createReplyQueue({ concurrency: 2 });
    const ran: number[] = [];

    expect(queue.enqueue(async () => { ran.push(1); })).toBe(true);
    expect(queue.enqueue(async () => { ran.push(2); })).toBe(true);
    await queue.onIdle();

    expect(ran).toEqual([1, 2]);
    expect(queue.getStats()).toEqual({ running: 0, pending: 0, completed: 2, rejected: 0, failed: 0 });
  });

  test('holds jobs beyond the concurrency limit and refuses them once full', async () => {
    const queue = createReplyQueue({ concurrency: 1, maxPending: 1 });
    const gate = createGate();
    const order: string[] = [];

    expect(queue.enqueue(async () => {
      await gate.promise;
      order.push('first');
    })).toBe(true);
    expect(queue.enqueue(async () => { order.push('second'); })).toBe(true);
    expect(queue.enqueue(async () => { order.push('third'); })).toBe(false);

    expect(queue.getStats()).toMatchObject({ running: 1, pending: 1, rejected: 1 });

    gate.open();
    await queue.onIdle();

    expect(order).toEqual(['first', 'second']);
    expect(queue.getStats()).toEqual({ running: 0, pending: 0, completed: 2, rejected: 1, failed: 0 });
  });

  test('a failing job is counted and does not stall the queue', async () => {
    const queue = createReplyQueue({ concurrency: 1 });
    let ranAfter = false;

    queue.enqueue(async () => {
      throw new Error('send exploded');
    });
    queue.enqueue(async () => {
      ranAfter = true;
    });
    await queue.onIdle();

    expect(ranAfter).toBe(true);
    expect(queue.getStats().failed).toBe(1);
    expect(queue.getStats().completed).toBe(2);
  });

  test('onIdle resolves at once for an empty queue', async () => {
    const queue = createReplyQueue();
    await expect(queue.onIdle()).resolves.toBeUndefined();
  });

  test('rejects nonsensical limits', () => {
    expect(() => createReplyQueue({ concurrency: 0 })).toThrow(RangeError);
    expect(() => createReplyQueue({ maxPending: -1 })).toThrow('maxPending must not be negative, got -1');
  });
});
