/**
 * modules/engine/src/dispatch/__tests__/DispatchQueue.spec.ts
 *
 * @file Tests for the single-consumer FIFO queue.
 */
import {describe, expect, it} from 'vitest';
import {DispatchQueue} from '../DispatchQueue.js';

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('DispatchQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new DispatchQueue();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await sleep(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      queue.enqueue(task('a', 20)),
      queue.enqueue(task('b', 0)),
      queue.enqueue(task('c', 5)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('keeps going after a failing task', async () => {
    const queue = new DispatchQueue();
    const failing = queue.enqueue(async () => {
      throw new Error('boom');
    });
    const next = queue.enqueue(async () => 'next');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
    expect(queue.size).toBe(0);
  });

  it('drains on close and refuses new tasks afterwards', async () => {
    const queue = new DispatchQueue();
    let finished = false;
    queue.enqueue(async () => {
      await sleep(10);
      finished = true;
    }).catch(() => undefined);

    await queue.close();

    expect(finished).toBe(true);
    expect(queue.isClosed).toBe(true);
    await expect(queue.enqueue(async () => 1)).rejects.toThrow('dispatch queue is closed');
  });
});
