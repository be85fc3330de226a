import { describe, it, expect } from 'vitest';
import { BatchQueue } from './batch-queue';
import { sleep } from '../utils';

describe('BatchQueue', () => {
  it('runs batches one after another in enqueue order', async () => {
    const trace: string[] = [];
    const queue = new BatchQueue<string>('test-queue', {
      runTask: async (task, batch) => {
        trace.push(`${batch.id}:${task}:start`);
        await sleep(5);
        trace.push(`${batch.id}:${task}:end`);
      },
      onBatchStart: (batch) => trace.push(`${batch.id}:begin`),
      onBatchEnd: (batch) => trace.push(`${batch.id}:finish`),
    });

    expect(queue.enqueue(['a', 'b'])).toBe(1);
    expect(queue.enqueue(['c'])).toBe(2);
    await queue.drained();

    expect(trace).toEqual([
      '1:begin',
      '1:a:start',
      '1:a:end',
      '1:b:start',
      '1:b:end',
      '1:finish',
      '2:begin',
      '2:c:start',
      '2:c:end',
      '2:finish',
    ]);
  });

  it('keeps going after a task throws', async () => {
    const done: number[] = [];
    const queue = new BatchQueue<number>('test-queue', {
      runTask: async (n) => {
        if (n === 1) throw new Error('bad task');
        done.push(n);
      },
    });

    queue.enqueue([1, 2, 3]);
    await queue.drained();

    expect(done).toEqual([2, 3]);
  });

  it('calls the idle hook when it drains and picks up later batches', async () => {
    let idleCalls = 0;
    const seen: string[] = [];
    const queue = new BatchQueue<string>('test-queue', {
      runTask: async (t) => {
        seen.push(t);
      },
      onIdle: async () => {
        idleCalls++;
      },
    });

    queue.enqueue(['first']);
    await queue.drained();
    queue.enqueue(['second']);
    await queue.drained();

    expect(seen).toEqual(['first', 'second']);
    expect(idleCalls).toBe(2);
  });

  it('resolves drained immediately when idle', async () => {
    const queue = new BatchQueue<string>('test-queue', { runTask: async () => undefined });

    await expect(queue.drained()).resolves.toBeUndefined();
  });
});
