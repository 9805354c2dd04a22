/**
 * Worker pool for deferred dispatch
 *
 * Limits concurrent executions and queues overflow work first-in first-out.
 * The queue is unbounded: deferred calls are never rejected for capacity,
 * they wait their turn. Work stays queued until it runs; there is no
 * cancellation.
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool({ name: 'geolayer', maxConcurrent: 5 });
 * const body = await pool.execute(() => transport.send(request));
 * ```
 */

import { logger as defaultLogger, type LoggerLike } from '../core/utils/logger.js';

export interface WorkerPoolConfig {
  readonly name: string;

  /** Maximum concurrent executions (default: 5) */
  readonly maxConcurrent: number;

  /** Receives queueing events (default: the module logger) */
  readonly logger: LoggerLike;
}

export interface WorkerPoolStats {
  readonly name: string;
  readonly activeCount: number;
  readonly queuedCount: number;
  readonly completedCount: number;
  readonly failedCount: number;
  readonly avgExecutionMs: number;
}

export const DEFAULT_MAX_CONCURRENT = 5;

export class WorkerPool {
  private readonly config: WorkerPoolConfig;
  private activeCount = 0;
  private readonly queue: Array<() => void> = [];
  private completedCount = 0;
  private failedCount = 0;
  private totalExecutionMs = 0;

  constructor(config: Partial<WorkerPoolConfig> = {}) {
    const maxConcurrent = config.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.config = { name: config.name ?? 'geolayer', maxConcurrent, logger: config.logger ?? defaultLogger };
  }

  /**
   * Run work on the pool
   *
   * Starts immediately when a slot is free, otherwise once every earlier
   * submission has started and a slot frees up.
   */
  execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        void this.run(fn).then(resolve, reject);
      };

      if (this.activeCount < this.config.maxConcurrent) {
        start();
      } else {
        this.queue.push(start);
        this.config.logger.debug('WorkerPool queued work', {
          pool: this.config.name,
          activeCount: this.activeCount,
          queuedCount: this.queue.length,
        });
      }
    });
  }

  private async run<T>(fn: () => Promise<T>): Promise<T> {
    this.activeCount++;
    const startTime = Date.now();

    try {
      const result = await fn();
      this.completedCount++;
      return result;
    } catch (error) {
      this.failedCount++;
      throw error;
    } finally {
      this.activeCount--;
      this.totalExecutionMs += Date.now() - startTime;
      this.processNextQueued();
    }
  }

  private processNextQueued(): void {
    if (this.activeCount >= this.config.maxConcurrent) {
      return;
    }

    const next = this.queue.shift();
    if (next) {
      next();
    }
  }

  getStats(): WorkerPoolStats {
    const finished = this.completedCount + this.failedCount;
    return {
      name: this.config.name,
      activeCount: this.activeCount,
      queuedCount: this.queue.length,
      completedCount: this.completedCount,
      failedCount: this.failedCount,
      avgExecutionMs: finished > 0 ? this.totalExecutionMs / finished : 0,
    };
  }
}
