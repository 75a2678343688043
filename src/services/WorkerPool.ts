import { availableParallelism } from 'os';

import { AppLogger } from '../utils/logger';
import { clamp } from '../utils/async';

export interface Runnable {
  run(): Promise<void>;
}

export class WorkerPool {
  private static readonly MIN_CAPACITY = 2;
  private static readonly MAX_CAPACITY = 4;

  private readonly queue: Runnable[] = [];
  private readonly idleWaiters = new Set<() => void>();
  private running = 0;
  private drainScheduled = false;

  readonly capacity: number;

  constructor(
    private readonly logger: AppLogger,
    capacity?: number,
  ) {
    this.capacity = WorkerPool.normalizeCapacity(capacity ?? WorkerPool.defaultCapacity());
  }

  static defaultCapacity(): number {
    return clamp(availableParallelism(), WorkerPool.MIN_CAPACITY, WorkerPool.MAX_CAPACITY);
  }

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /** Queues a worker in FIFO order. Workers never start synchronously. */
  start(worker: Runnable): void {
    this.queue.push(worker);
    this.scheduleDrain();
  }

  /** Resolves `true` once nothing is running or queued, `false` when `timeoutMs` elapses first. */
  waitForDone(timeoutMs: number): Promise<boolean> {
    if (this.isIdle()) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const onIdle = (): void => {
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        this.idleWaiters.delete(onIdle);
        resolve(false);
      }, Math.max(timeoutMs, 0));

      this.idleWaiters.add(onIdle);
    });
  }

  private static normalizeCapacity(requested: number): number {
    if (!Number.isFinite(requested) || requested < 1) {
      return 1;
    }

    return Math.floor(requested);
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) {
      return;
    }

    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    while (this.running < this.capacity) {
      const next = this.queue.shift();

      if (!next) {
        break;
      }

      this.running += 1;
      void next
        .run()
        .catch((error: unknown) => {
          this.logger.error('Pooled worker failed unexpectedly.', error);
        })
        .finally(() => {
          this.running -= 1;
          this.drain();
          this.notifyIfIdle();
        });
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }

    for (const waiter of Array.from(this.idleWaiters)) {
      this.idleWaiters.delete(waiter);
      waiter();
    }
  }
}
