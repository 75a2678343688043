import type { ProgressCallback, TaskId } from '../types/translation';
import { clamp } from '../utils/async';

export interface WorkerHandle {
  readonly taskId: TaskId;
  readonly attempt: number;
  readonly isCancelled: boolean;
  cancel(): void;
}

export interface WorkerFailure {
  message: string;
  trace?: string;
  error: unknown;
}

export interface WorkerHandlers<TResult> {
  onStarted?: (worker: TranslationWorker<TResult>) => void;
  onProgress?: (worker: TranslationWorker<TResult>, percentage: number, message: string) => void;
  onResult?: (worker: TranslationWorker<TResult>, result: TResult) => void;
  onError?: (worker: TranslationWorker<TResult>, failure: WorkerFailure) => void;
  onFinished?: (worker: TranslationWorker<TResult>) => void;
}

export type WorkerJob<TResult> = (onProgress: ProgressCallback) => Promise<TResult>;

/**
 * Runs one attempt of a task. Emits `started`, any number of `progress`, one of
 * `result`/`error`, then `finished`. Cancellation is checked before the job starts
 * and after it settles; when set at either point only `finished` is emitted. A job
 * already in flight is never interrupted.
 */
export class TranslationWorker<TResult> implements WorkerHandle {
  private cancelled = false;
  private hasRun = false;
  private settled = false;

  constructor(
    readonly taskId: TaskId,
    readonly attempt: number,
    private readonly job: WorkerJob<TResult>,
    private readonly handlers: WorkerHandlers<TResult> = {},
  ) {}

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    this.cancelled = true;
  }

  async run(): Promise<void> {
    if (this.hasRun) {
      throw new Error(`Worker for task ${this.taskId} (attempt ${this.attempt}) has already run.`);
    }

    this.hasRun = true;

    try {
      if (this.cancelled) {
        return;
      }

      this.handlers.onStarted?.(this);

      let result: TResult;

      try {
        result = await this.job((percentage, message) => this.reportProgress(percentage, message));
      } catch (error) {
        this.settled = true;

        if (this.cancelled) {
          return;
        }

        this.handlers.onError?.(this, {
          message: error instanceof Error ? error.message || error.name : String(error),
          trace: error instanceof Error ? error.stack : undefined,
          error,
        });
        return;
      }

      this.settled = true;

      if (this.cancelled) {
        return;
      }

      this.handlers.onResult?.(this, result);
    } finally {
      this.handlers.onFinished?.(this);
    }
  }

  private reportProgress(percentage: number, message: string): void {
    if (this.cancelled || this.settled) {
      return;
    }

    const normalized = Number.isFinite(percentage) ? Math.round(clamp(percentage, 0, 100)) : 0;
    this.handlers.onProgress?.(this, normalized, message);
  }
}
