/**
 * Batch Queue
 *
 * Single-consumer FIFO of task batches. One async worker drains tasks
 * strictly in enqueue order; batches never interleave. A batch enqueued
 * while another runs waits its turn.
 */

import { createLogger, errorMessage, type Logger } from '../../../shared/logger';

export interface Batch<T> {
  id: number;
  tasks: T[];
}

export interface BatchHandlers<T> {
  runTask(task: T, batch: Batch<T>): Promise<void>;
  onBatchStart?(batch: Batch<T>): void;
  onBatchEnd?(batch: Batch<T>): void;
  /** Called each time the queue drains to empty */
  onIdle?(): Promise<void>;
}

export class BatchQueue<T> {
  private readonly batches: Batch<T>[] = [];
  private active = false;
  private nextId = 1;
  private idleWaiters: Array<() => void> = [];
  private readonly log: Logger;

  constructor(name: string, private readonly handlers: BatchHandlers<T>) {
    this.log = createLogger(name);
  }

  /** Append a batch and return its id without waiting for it to run. */
  enqueue(tasks: T[]): number {
    const batch: Batch<T> = { id: this.nextId++, tasks: [...tasks] };
    this.batches.push(batch);
    this.log.info('batch queued', { batch: batch.id, tasks: batch.tasks.length, waiting: this.batches.length });

    if (!this.active) {
      this.active = true;
      this.drain().catch((e) => this.log.error('worker crashed', { error: errorMessage(e) }));
    }
    return batch.id;
  }

  pendingBatches(): number {
    return this.batches.length;
  }

  /** Resolves once the worker has nothing left to do. */
  drained(): Promise<void> {
    if (!this.active) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private async drain(): Promise<void> {
    try {
      for (;;) {
        const batch = this.batches.shift();
        if (!batch) {
          await this.runIdleHook();
          if (this.batches.length === 0) return;
          continue;
        }
        await this.runBatch(batch);
      }
    } finally {
      this.active = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async runBatch(batch: Batch<T>): Promise<void> {
    this.handlers.onBatchStart?.(batch);
    for (const task of batch.tasks) {
      try {
        await this.handlers.runTask(task, batch);
      } catch (e) {
        this.log.error('task failed outside its handler', { batch: batch.id, error: errorMessage(e) });
      }
    }
    this.handlers.onBatchEnd?.(batch);
  }

  private async runIdleHook(): Promise<void> {
    if (!this.handlers.onIdle) return;
    try {
      await this.handlers.onIdle();
    } catch (e) {
      this.log.warn('idle hook failed', { error: errorMessage(e) });
    }
  }
}
