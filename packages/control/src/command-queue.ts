/**
 * CommandQueue - Bounded FIFO between callers and a pipeline drainer
 *
 * `put` waits only while the queue is full. `take` waits while it is empty
 * and returns up to `max` items. After `close()` waiting callers wake up:
 * takers receive what is left (then empty batches), putters are rejected.
 */

import { NotRunningError } from '@hubcast/types';

const DEFAULT_CAPACITY = 64;

export class CommandQueue<T> {
  readonly capacity: number;
  private items: T[] = [];
  private waitingTakers: Array<() => void> = [];
  private waitingPutters: Array<() => void> = [];
  private closed = false;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid queue capacity: ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async put(item: T): Promise<void> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.waitingPutters.push(resolve));
    }
    if (this.closed) {
      throw new NotRunningError('Command queue is closed');
    }
    this.items.push(item);
    this.waitingTakers.shift()?.();
  }

  async take(max = 1): Promise<T[]> {
    while (!this.closed && this.items.length === 0) {
      await new Promise<void>((resolve) => this.waitingTakers.push(resolve));
    }
    const batch = this.items.splice(0, Math.max(1, max));
    for (let i = 0; i < batch.length; i++) {
      this.waitingPutters.shift()?.();
    }
    return batch;
  }

  /** Remove and return everything still queued. */
  drain(): T[] {
    const rest = this.items;
    this.items = [];
    return rest;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const wake of this.waitingTakers.splice(0)) wake();
    for (const wake of this.waitingPutters.splice(0)) wake();
  }
}
