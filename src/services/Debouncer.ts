import type { TaskId } from '../types/translation';

/**
 * Holds at most one pending payload. Every `submit` replaces it and restarts the
 * delay; only the payload present when the timer fires is dispatched.
 */
export class Debouncer<TPayload> {
  private pending: { taskId: TaskId; payload: TPayload } | undefined;
  private timer: NodeJS.Timeout | undefined;
  private disposed = false;

  constructor(
    private readonly delayMs: number,
    private readonly dispatch: (taskId: TaskId, payload: TPayload) => void,
  ) {}

  get pendingTaskId(): TaskId | undefined {
    return this.pending?.taskId;
  }

  submit(taskId: TaskId, payload: TPayload): void {
    if (this.disposed) {
      throw new Error('Debouncer has been disposed.');
    }

    this.clearTimer();
    this.pending = { taskId, payload };
    this.timer = setTimeout(() => this.fire(), this.delayMs);
  }

  /** Drops the pending payload, returning its task id when there was one. */
  cancel(): TaskId | undefined {
    const taskId = this.pending?.taskId;
    this.clearTimer();
    this.pending = undefined;
    return taskId;
  }

  dispose(): void {
    this.cancel();
    this.disposed = true;
  }

  private fire(): void {
    this.timer = undefined;
    const pending = this.pending;
    this.pending = undefined;

    if (pending) {
      this.dispatch(pending.taskId, pending.payload);
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
