/**
 * Task Pool - bounded concurrency for async work
 *
 * Features:
 * - Configurable max concurrency (semaphore-based)
 * - FIFO queue for tasks waiting on a free slot
 * - A pool of size 1 doubles as a mutual-exclusion lock
 */

import type { RunLogger } from './types';

// ============================================
// Types
// ============================================

export type PoolConfig = {
  /** Max tasks running at once */
  maxConcurrency: number;
  /** Name used in debug lines */
  name?: string;
  /** Enable debug logging */
  debug?: boolean;
  /** Where debug lines go (default: console) */
  logger?: Pick<RunLogger, 'log'>;
};

// ============================================
// Pool Implementation
// ============================================

export class TaskPool {
  private readonly maxConcurrency: number;
  private readonly name: string;
  private readonly debug: boolean;
  private readonly logger: Pick<RunLogger, 'log'>;
  private inFlight = 0;
  private queue: Array<() => void> = [];
  private completed = 0;
  private failed = 0;

  constructor(config: PoolConfig) {
    if (!Number.isInteger(config.maxConcurrency) || config.maxConcurrency < 1) {
      throw new Error(`maxConcurrency must be a positive integer, got ${config.maxConcurrency}`);
    }
    this.maxConcurrency = config.maxConcurrency;
    this.name = config.name ?? 'TaskPool';
    this.debug = config.debug ?? false;
    this.logger = config.logger ?? { log: (message) => console.log(message) };
  }

  /**
   * Run a task once a slot is free
   */
  run<T>(execute: () => Promise<T> | T): Promise<T> {
    if (this.inFlight < this.maxConcurrency) {
      return this.runTask(execute);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.runTask(execute).then(resolve, reject);
      });
      this.log(`Queued task (queue size: ${this.queue.length})`);
    });
  }

  /**
   * Get current pool stats
   */
  getStats() {
    return {
      inFlight: this.inFlight,
      queued: this.queue.length,
      completed: this.completed,
      failed: this.failed,
      maxConcurrency: this.maxConcurrency,
    };
  }

  // ============================================
  // Private Methods
  // ============================================

  private async runTask<T>(execute: () => Promise<T> | T): Promise<T> {
    this.inFlight++;
    this.log(`Starting task (in-flight: ${this.inFlight})`);

    try {
      const result = await execute();
      this.completed++;
      return result;
    } catch (error) {
      this.failed++;
      throw error;
    } finally {
      this.inFlight--;
      this.log(`Completed task (in-flight: ${this.inFlight})`);
      this.processQueue();
    }
  }

  private processQueue() {
    if (this.inFlight >= this.maxConcurrency) return;
    const next = this.queue.shift();
    if (next) next();
  }

  private log(message: string) {
    if (this.debug) {
      this.logger.log(`[${this.name}] ${message}`);
    }
  }
}

// ============================================
// Factory Function
// ============================================

export function createTaskPool(config: PoolConfig): TaskPool {
  return new TaskPool(config);
}
