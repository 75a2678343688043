import type { OrchestrationConfiguration } from '../types/config';
import type {
  RetryState,
  TaskId,
  TranslationError,
  TranslationErrorKind,
  TranslationRequest,
} from '../types/translation';

export type RetryDecision =
  | {
      action: 'retry';
      delayMs: number;
      attempt: number;
      maxAttempts: number;
    }
  | {
      action: 'fail';
      attempt: number;
      reason: 'notRetryable' | 'exhausted';
    };

type RetrySettings = Pick<
  OrchestrationConfiguration,
  'maxRetries' | 'memoryErrorMaxRetries' | 'initialRetryDelayMs' | 'maxRetryDelayMs' | 'backoffMultiplier'
>;

export class RetryPolicy {
  constructor(private readonly settings: RetrySettings) {}

  createState(taskId: TaskId, request: TranslationRequest): RetryState {
    return {
      taskId,
      request,
      attempt: 0,
      maxAttempts: this.settings.maxRetries + 1,
    };
  }

  effectiveMaxRetries(kind: TranslationErrorKind): number {
    return kind === 'memory' ? this.settings.memoryErrorMaxRetries : this.settings.maxRetries;
  }

  /** `attempt` is the 1-based number of the attempt that just failed. */
  computeDelay(attempt: number): number {
    const exponent = Math.max(attempt, 1) - 1;
    const raw = this.settings.initialRetryDelayMs * Math.pow(this.settings.backoffMultiplier, exponent);
    return Math.round(Math.min(raw, this.settings.maxRetryDelayMs));
  }

  decide(state: RetryState, error: TranslationError): RetryDecision {
    if (!error.isRetryable) {
      return { action: 'fail', attempt: state.attempt, reason: 'notRetryable' };
    }

    const maxRetries = this.effectiveMaxRetries(error.kind);

    if (state.attempt > maxRetries) {
      return { action: 'fail', attempt: state.attempt, reason: 'exhausted' };
    }

    return {
      action: 'retry',
      delayMs: this.computeDelay(state.attempt),
      attempt: state.attempt,
      maxAttempts: maxRetries + 1,
    };
  }
}
