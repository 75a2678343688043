import type { TaskId, TaskState, TranslationError } from '../types/translation';

export interface OrchestratorEvents {
  /** Fired once per attempt, when the worker actually begins executing. */
  started: {
    taskId: TaskId;
    attempt: number;
  };
  progress: {
    taskId: TaskId;
    percentage: number;
    message: string;
  };
  complete: {
    taskId: TaskId;
    detectedLanguage: string;
    text: string;
  };
  error: {
    taskId: TaskId;
    error: TranslationError;
  };
  retrying: {
    taskId: TaskId;
    attempt: number;
    maxAttempts: number;
    delayMs: number;
  };
  /** Fired exactly once per task, after it reaches a terminal state. */
  finished: {
    taskId: TaskId;
    state: Extract<TaskState, 'succeeded' | 'failed' | 'cancelled'>;
  };
}

export type OrchestratorEventName = keyof OrchestratorEvents;
