/**
 * KeyedSerialQueue Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { KeyedSerialQueue } from '../src/utils/keyed-queue.js';
import { QueueFullError } from '../src/types/index.js';
import { deferred } from './helpers.js';

describe('KeyedSerialQueue', () => {
  it('should run tasks for one key one at a time in submission order', async () => {
    const queue = new KeyedSerialQueue();
    const log: string[] = [];
    const gate = deferred<void>();

    const first = queue.enqueue('a', async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
      return 1;
    });
    const second = queue.enqueue('a', async () => {
      log.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(log).toEqual(['first:start']);
    expect(queue.isActive('a')).toBe(true);
    expect(queue.getQueueDepth('a')).toBe(1);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should run different keys concurrently', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred<void>();

    const blocked = queue.enqueue('a', async () => {
      await gate.promise;
      return 'a';
    });
    const other = await queue.enqueue('b', async () => 'b');

    expect(other).toBe('b');
    expect(queue.isActive('a')).toBe(true);

    gate.resolve();
    await expect(blocked).resolves.toBe('a');
  });

  it('should reject with QueueFullError when a lane is at capacity', async () => {
    const queue = new KeyedSerialQueue({ maxQueueDepth: 1 });
    const gate = deferred<void>();
    const backpressure = vi.fn();
    queue.on('backpressure', backpressure);

    const active = queue.enqueue('a', () => gate.promise);
    const waiting = queue.enqueue('a', async () => 'waiting');
    const rejected = queue.enqueue('a', async () => 'never');

    await expect(rejected).rejects.toBeInstanceOf(QueueFullError);
    await expect(rejected).rejects.toMatchObject({ code: 'QUEUE_FULL', retryable: true, depth: 1 });
    expect(backpressure).toHaveBeenCalledWith('a', 1);

    // Other keys are unaffected
    await expect(queue.enqueue('b', async () => 'b')).resolves.toBe('b');

    gate.resolve();
    await active;
    await expect(waiting).resolves.toBe('waiting');
  });

  it('should keep draining after a task fails', async () => {
    const queue = new KeyedSerialQueue();

    const failing = queue.enqueue('a', async () => {
      throw new Error('boom');
    });
    const next = queue.enqueue('a', async () => 'next');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });

  it('should emit key-idle and release the lane once drained', async () => {
    const queue = new KeyedSerialQueue();
    const idle: string[] = [];
    queue.on('key-idle', (key: string) => idle.push(key));

    await queue.enqueue('a', async () => undefined);

    await vi.waitFor(() => expect(idle).toEqual(['a']));
    expect(queue.activeKeys).toBe(0);
    expect(queue.getQueueDepth('a')).toBe(0);
  });
});
