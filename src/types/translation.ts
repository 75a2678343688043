export type TaskId = string;

export type TranslationErrorKind =
  | 'network'
  | 'memory'
  | 'model'
  | 'timeout'
  | 'validation'
  | 'unknown';

export type ProviderErrorCode =
  | 'authentication'
  | 'timeout'
  | 'rateLimit'
  | 'network'
  | 'server'
  | 'modelUnavailable'
  | 'invalidResponse'
  | 'unknown';

export type TaskState = 'pending' | 'running' | 'retrying' | 'succeeded' | 'failed' | 'cancelled';

export interface TranslationRequest {
  readonly text: string;
  readonly sourceLanguage: string;
  readonly targetLanguage: string;
}

export interface TranslationError {
  readonly kind: TranslationErrorKind;
  /** Raw failure message as produced by the translator or runtime. */
  readonly message: string;
  readonly cause: string;
  readonly solution: string;
  readonly isRetryable: boolean;
  readonly trace?: string;
  readonly originalError?: unknown;
}

export interface TranslationOutcome {
  detectedLanguage: string;
  text: string;
}

export type ProgressCallback = (percentage: number, message: string) => void;

export interface Translator {
  translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
    onProgress?: ProgressCallback,
  ): Promise<string>;
}

export interface LanguageDetector {
  detect(text: string): string | undefined;
}

export interface RetryState {
  readonly taskId: TaskId;
  readonly request: TranslationRequest;
  attempt: number;
  readonly maxAttempts: number;
}

export interface OrchestratorSnapshot {
  activeTaskIds: TaskId[];
  retryTaskIds: TaskId[];
  timedTaskIds: TaskId[];
  scheduledRetryTaskIds: TaskId[];
  pendingTaskId?: TaskId;
}
