import { getLogger } from '@wirecall/logger';

import type { Awaitable } from '../core/awaitable.js';
import { getHttpConfig } from '../config.js';

import { assertOffloadRuntime } from './runtime.js';

/**
 * Bounded pool for offloaded work. Each task starts on a later macrotask and
 * holds its slot until it settles; at most `size` tasks run at once.
 */
export class WorkerPool {
  readonly size: number;
  private readonly logger = getLogger('WorkerPool');
  private readonly queue: (() => void)[] = [];
  private readonly idleWaiters: (() => void)[] = [];
  private active = 0;

  constructor(size?: number) {
    assertOffloadRuntime('WorkerPool');

    const resolved = size ?? getHttpConfig().offloadPoolSize;
    if (!Number.isInteger(resolved) || resolved <= 0) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${resolved}`);
    }
    this.size = resolved;
  }

  /** Tasks running or waiting for a slot */
  get pending(): number {
    return this.active + this.queue.length;
  }

  run<T>(task: () => Awaitable<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        setImmediate(() => {
          void this.runTask(task, resolve, reject);
        });
      });
      this.dispatch();
    });
  }

  /** Resolves once every task dispatched so far (and any they dispatch) has settled */
  drain(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async runTask<T>(
    task: () => Awaitable<T>,
    resolve: (value: T) => void,
    reject: (reason: unknown) => void
  ): Promise<void> {
    try {
      resolve(await task());
    } catch (error) {
      reject(error);
    } finally {
      this.release();
    }
  }

  private dispatch(): void {
    while (this.active < this.size) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      this.active++;
      next();
    }
    if (this.queue.length > 0) {
      this.logger.trace({ active: this.active, queued: this.queue.length }, 'Worker pool saturated');
    }
  }

  private release(): void {
    this.active--;
    this.dispatch();
    if (this.pending === 0) {
      for (const waiter of this.idleWaiters.splice(0)) {
        waiter();
      }
    }
  }
}
