import { describe, it, expect } from '@jest/globals';
import { AsyncQueue } from '../async-queue.js';

describe('AsyncQueue', () => {
  it('should yield buffered items in order, then finish after end()', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('a');
    queue.push('b');
    queue.end();

    const items: string[] = [];
    for await (const item of queue) {
      items.push(item);
    }
    expect(items).toEqual(['a', 'b']);
  });

  it('should resolve a waiting reader when an item arrives', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next();
    queue.push('late');
    await expect(pending).resolves.toEqual({ value: 'late', done: false });
  });

  it('should drain buffered items before throwing the end error', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('a');
    queue.end(new Error('closed'));

    await expect(queue.next()).resolves.toEqual({ value: 'a', done: false });
    await expect(queue.next()).rejects.toThrow('closed');
    await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('should reject waiting readers when ended with an error', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next();
    queue.end(new Error('gone'));
    await expect(pending).rejects.toThrow('gone');
  });

  it('should ignore pushes after end()', async () => {
    const queue = new AsyncQueue<string>();
    queue.end();
    queue.push('ignored');
    expect(queue.size).toBe(0);
    expect(queue.isEnded).toBe(true);
    await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
  });
});
