import { v4 as uuidv4 } from 'uuid';

import type { OrchestrationConfiguration } from '../types/config';
import type {
  LanguageDetector,
  OrchestratorSnapshot,
  ProgressCallback,
  RetryState,
  TaskId,
  TaskState,
  TranslationError,
  TranslationOutcome,
  TranslationRequest,
  Translator,
} from '../types/translation';
import type { OrchestratorEvents } from '../messaging/channel';
import { EventChannel, type Listener } from '../messaging/EventChannel';
import { AUTO_DETECT, FALLBACK_SOURCE_LANGUAGE } from '../constants/languages';
import { AppLogger } from '../utils/logger';
import type { Disposable } from '../utils/disposable';
import { countCharacters, previewText, sanitizeErrorMessage } from '../utils/text';
import { Debouncer } from './Debouncer';
import { ErrorClassifier } from './ErrorClassifier';
import { RequestValidationError, RequestValidator } from './RequestValidator';
import { RetryPolicy } from './RetryPolicy';
import { TranslationWorker, type WorkerHandlers } from './TranslationWorker';
import { WorkerPool } from './WorkerPool';

export interface TranslationOrchestratorOptions {
  configuration: OrchestrationConfiguration;
  translator: Translator;
  languageDetector: LanguageDetector;
  logger: AppLogger;
  pool?: WorkerPool;
  createTaskId?: () => TaskId;
}

type AttemptWorker = TranslationWorker<TranslationOutcome>;

/**
 * Coordinates translation tasks: debouncing, dispatch onto the worker pool,
 * per-attempt timeouts and the retry state machine. The most recent submission
 * always wins; executing a task cancels everything that came before it.
 *
 * All state lives on the event loop. Worker callbacks are matched against the
 * current worker of their task, so events from superseded or timed-out attempts
 * are dropped.
 */
export class TranslationOrchestrator implements Disposable {
  private readonly configuration: OrchestrationConfiguration;
  private readonly translator: Translator;
  private readonly languageDetector: LanguageDetector;
  private readonly logger: AppLogger;
  private readonly pool: WorkerPool;
  private readonly createTaskId: () => TaskId;
  private readonly events: EventChannel<OrchestratorEvents>;
  private readonly debouncer: Debouncer<TranslationRequest>;
  private readonly retryPolicy: RetryPolicy;
  private readonly validator: RequestValidator;

  private readonly activeTasks = new Map<TaskId, AttemptWorker>();
  private readonly retryStates = new Map<TaskId, RetryState>();
  private readonly timeoutTimers = new Map<TaskId, NodeJS.Timeout>();
  private readonly retryTimers = new Map<TaskId, NodeJS.Timeout>();
  private readonly rejectionNotices = new Set<NodeJS.Immediate>();
  private executions = 0;
  private stopped = false;

  private readonly workerHandlers: WorkerHandlers<TranslationOutcome> = {
    onStarted: (worker) => this.handleWorkerStarted(worker),
    onProgress: (worker, percentage, message) => this.handleWorkerProgress(worker, percentage, message),
    onResult: (worker, outcome) => this.handleWorkerResult(worker, outcome),
    onError: (worker, failure) =>
      this.handleWorkerError(worker, ErrorClassifier.classify(failure.error, failure.message, failure.trace)),
    onFinished: (worker) => this.handleWorkerFinished(worker),
  };

  constructor(options: TranslationOrchestratorOptions) {
    this.configuration = options.configuration;
    this.translator = options.translator;
    this.languageDetector = options.languageDetector;
    this.logger = options.logger;
    this.pool = options.pool ?? new WorkerPool(options.logger, options.configuration.poolSize);
    this.createTaskId = options.createTaskId ?? (() => uuidv4());
    this.events = new EventChannel<OrchestratorEvents>((event, error) => {
      this.logger.error(`Listener for "${String(event)}" threw.`, error);
    });
    this.debouncer = new Debouncer<TranslationRequest>(options.configuration.debounceMs, (taskId, request) => {
      this.logger.debug(`Executing debounced task ${taskId}.`);
      this.execute(request, taskId);
    });
    this.retryPolicy = new RetryPolicy(options.configuration);
    this.validator = new RequestValidator(options.configuration.maxTextLength);

    this.logger.info(
      `Translation orchestrator ready (${this.configuration.debounceMs}ms debounce, ${this.pool.capacity} worker(s), ${this.configuration.maxRetries} retries).`,
    );
  }

  on<K extends keyof OrchestratorEvents>(event: K, listener: Listener<OrchestratorEvents[K]>): Disposable {
    return this.events.on(event, listener);
  }

  once<K extends keyof OrchestratorEvents>(event: K, listener: Listener<OrchestratorEvents[K]>): Disposable {
    return this.events.once(event, listener);
  }

  /**
   * Submits text for translation. With `debounce`, the request waits for the
   * debounce window and is replaced by any later debounced submission; requests
   * replaced this way are never dispatched and emit no events.
   */
  submit(text: string, sourceLanguage: string, targetLanguage: string, debounce = true): TaskId {
    this.assertRunning();

    const taskId = this.createTaskId();
    const request: TranslationRequest = { text, sourceLanguage, targetLanguage };

    this.logger.event('translation.submitted', {
      taskId,
      debounce,
      characters: countCharacters(text),
      sourceLanguage,
      targetLanguage,
    });

    if (debounce) {
      this.debouncer.submit(taskId, request);
      return taskId;
    }

    return this.execute(request, taskId);
  }

  execute(request: TranslationRequest, taskId: TaskId = this.createTaskId()): TaskId {
    this.assertRunning();

    const execution = ++this.executions;
    this.cancelAll();

    // A `finished` listener may have executed a newer request while the old tasks were cancelled.
    if (execution !== this.executions || this.stopped) {
      this.logger.info(`Task ${taskId} superseded before dispatch.`);
      this.logger.event('translation.cancelled', { taskId });
      this.events.fire('finished', { taskId, state: 'cancelled' });
      return taskId;
    }

    let validated: TranslationRequest;

    try {
      validated = this.validator.validate(request);
    } catch (error) {
      if (error instanceof RequestValidationError) {
        this.rejectRequest(taskId, error);
        return taskId;
      }

      throw error;
    }

    const state = this.retryPolicy.createState(taskId, validated);
    this.retryStates.set(taskId, state);

    this.logger.event('translation.dispatched', {
      taskId,
      maxAttempts: state.maxAttempts,
      sourceLanguage: validated.sourceLanguage,
      targetLanguage: validated.targetLanguage,
    });

    this.startAttempt(state);
    return taskId;
  }

  cancel(taskId: TaskId): boolean {
    if (this.debouncer.pendingTaskId === taskId) {
      this.debouncer.cancel();
      this.logger.info(`Pending task ${taskId} cancelled before dispatch.`);
      this.events.fire('finished', { taskId, state: 'cancelled' });
      return true;
    }

    if (!this.releaseTask(taskId)) {
      return false;
    }

    this.logger.info(`Task ${taskId} cancelled.`);
    this.logger.event('translation.cancelled', { taskId });
    this.events.fire('finished', { taskId, state: 'cancelled' });
    return true;
  }

  cancelAll(): void {
    const taskIds = new Set<TaskId>([...this.activeTasks.keys(), ...this.retryStates.keys()]);
    const pendingTaskId = this.debouncer.cancel();

    if (pendingTaskId) {
      taskIds.add(pendingTaskId);
    }

    if (taskIds.size === 0) {
      return;
    }

    this.logger.info(`Cancelling ${taskIds.size} task(s).`);

    for (const taskId of taskIds) {
      this.releaseTask(taskId);
    }

    for (const taskId of taskIds) {
      this.logger.event('translation.cancelled', { taskId });
      this.events.fire('finished', { taskId, state: 'cancelled' });
    }
  }

  /**
   * Cancels everything, refuses further submissions and waits up to `waitMs` for
   * in-flight translation calls to settle. Resolves whether they did.
   */
  async shutdown(waitMs: number): Promise<boolean> {
    if (!this.stopped) {
      this.logger.info('Shutting down translation orchestrator...');
      this.stop();
    }

    const drained = await this.pool.waitForDone(waitMs);

    if (drained) {
      this.logger.info('Translation orchestrator shutdown complete.');
    } else {
      this.logger.warn(
        `Shutdown finished with ${this.pool.activeCount} translation call(s) still in flight.`,
      );
    }

    return drained;
  }

  dispose(): void {
    this.stop();
  }

  getTaskState(taskId: TaskId): TaskState | undefined {
    if (this.debouncer.pendingTaskId === taskId) {
      return 'pending';
    }

    if (this.activeTasks.has(taskId)) {
      return 'running';
    }

    if (this.retryTimers.has(taskId)) {
      return 'retrying';
    }

    return undefined;
  }

  snapshot(): OrchestratorSnapshot {
    return {
      activeTaskIds: Array.from(this.activeTasks.keys()),
      retryTaskIds: Array.from(this.retryStates.keys()),
      timedTaskIds: Array.from(this.timeoutTimers.keys()),
      scheduledRetryTaskIds: Array.from(this.retryTimers.keys()),
      pendingTaskId: this.debouncer.pendingTaskId,
    };
  }

  private stop(): void {
    this.cancelAll();
    this.stopped = true;
    this.debouncer.dispose();

    for (const notice of this.rejectionNotices) {
      clearImmediate(notice);
    }

    this.rejectionNotices.clear();
    this.events.dispose();
  }

  private assertRunning(): void {
    if (this.stopped) {
      throw new Error('Translation orchestrator has been shut down.');
    }
  }

  private startAttempt(state: RetryState): void {
    state.attempt += 1;

    const worker: AttemptWorker = new TranslationWorker(
      state.taskId,
      state.attempt,
      (onProgress) => this.runTranslation(state.request, onProgress),
      this.workerHandlers,
    );

    this.activeTasks.set(state.taskId, worker);
    this.timeoutTimers.set(
      state.taskId,
      setTimeout(() => this.handleTimeout(worker), this.configuration.translationTimeoutMs),
    );

    this.logger.debug(`Task ${state.taskId} attempt ${state.attempt}/${state.maxAttempts} queued.`);
    this.pool.start(worker);
  }

  private async runTranslation(
    request: TranslationRequest,
    onProgress: ProgressCallback,
  ): Promise<TranslationOutcome> {
    const started = Date.now();
    let sourceLanguage = request.sourceLanguage;

    if (sourceLanguage === AUTO_DETECT) {
      onProgress(10, 'Detecting language...');
      sourceLanguage = this.languageDetector.detect(request.text) ?? FALLBACK_SOURCE_LANGUAGE;
      this.logger.info(`Detected source language: ${sourceLanguage}`);
    }

    onProgress(20, 'Translating...');

    const text = await this.translator.translate(
      request.text,
      sourceLanguage,
      request.targetLanguage,
      onProgress,
    );

    this.logger.info(
      `Translation completed in ${Date.now() - started}ms: "${previewText(request.text)}" (${countCharacters(request.text)} chars) -> "${previewText(text)}" (${countCharacters(text)} chars)`,
    );

    return { detectedLanguage: sourceLanguage, text };
  }

  private isCurrent(worker: AttemptWorker): boolean {
    return this.activeTasks.get(worker.taskId) === worker;
  }

  private handleWorkerStarted(worker: AttemptWorker): void {
    if (!this.isCurrent(worker)) {
      return;
    }

    this.logger.debug(`Worker started: ${worker.taskId} (attempt ${worker.attempt}).`);
    this.events.fire('started', { taskId: worker.taskId, attempt: worker.attempt });
  }

  private handleWorkerProgress(worker: AttemptWorker, percentage: number, message: string): void {
    if (!this.isCurrent(worker)) {
      return;
    }

    this.events.fire('progress', { taskId: worker.taskId, percentage, message });
  }

  private handleWorkerResult(worker: AttemptWorker, outcome: TranslationOutcome): void {
    if (!this.isCurrent(worker)) {
      return;
    }

    const { taskId } = worker;
    this.clearAttempt(taskId);
    this.retryStates.delete(taskId);

    this.logger.event('translation.succeeded', {
      taskId,
      attempt: worker.attempt,
      detectedLanguage: outcome.detectedLanguage,
      characters: countCharacters(outcome.text),
    });

    this.events.fire('complete', {
      taskId,
      detectedLanguage: outcome.detectedLanguage,
      text: outcome.text,
    });
    this.events.fire('finished', { taskId, state: 'succeeded' });
  }

  private handleWorkerError(worker: AttemptWorker, error: TranslationError): void {
    if (!this.isCurrent(worker)) {
      return;
    }

    this.clearAttempt(worker.taskId);
    this.logger.debug(`Worker error for ${worker.taskId}: ${error.message}\n${error.trace ?? ''}`);
    this.handleFailure(worker.taskId, error);
  }

  private handleWorkerFinished(worker: AttemptWorker): void {
    this.logger.debug(
      `Worker finished: ${worker.taskId} (attempt ${worker.attempt}${worker.isCancelled ? ', cancelled' : ''}).`,
    );
  }

  private handleTimeout(worker: AttemptWorker): void {
    this.timeoutTimers.delete(worker.taskId);

    if (!this.isCurrent(worker)) {
      return;
    }

    worker.cancel();
    this.clearAttempt(worker.taskId);

    this.logger.warn(
      `Task ${worker.taskId} attempt ${worker.attempt} timed out after ${this.configuration.translationTimeoutMs}ms.`,
    );
    this.logger.event('translation.timeout', {
      taskId: worker.taskId,
      attempt: worker.attempt,
      timeoutMs: this.configuration.translationTimeoutMs,
    });

    this.handleFailure(worker.taskId, ErrorClassifier.createTimeoutError(this.configuration.translationTimeoutMs));
  }

  private handleFailure(taskId: TaskId, error: TranslationError): void {
    const state = this.retryStates.get(taskId);

    if (!state) {
      return;
    }

    const decision = this.retryPolicy.decide(state, error);

    if (decision.action === 'retry') {
      this.logger.warn(
        `Task ${taskId} failed (${error.kind}). Retrying in ${decision.delayMs}ms (${decision.attempt}/${decision.maxAttempts}).`,
      );
      this.logger.event('translation.retryScheduled', {
        taskId,
        errorKind: error.kind,
        attempt: decision.attempt,
        maxAttempts: decision.maxAttempts,
        delayMs: decision.delayMs,
      });

      // Armed before notifying so a listener that cancels the task also clears the timer.
      this.retryTimers.set(
        taskId,
        setTimeout(() => {
          this.retryTimers.delete(taskId);

          if (this.retryStates.get(taskId) === state) {
            this.startAttempt(state);
          }
        }, decision.delayMs),
      );

      this.events.fire('retrying', {
        taskId,
        attempt: decision.attempt,
        maxAttempts: decision.maxAttempts,
        delayMs: decision.delayMs,
      });
      return;
    }

    this.retryStates.delete(taskId);

    this.logger.error(
      `Translation ${taskId} failed after ${decision.attempt} attempt(s) (${error.kind}, ${decision.reason}): ${sanitizeErrorMessage(error.message)}`,
    );
    this.logger.event('translation.failed', {
      taskId,
      errorKind: error.kind,
      attempts: decision.attempt,
      reason: decision.reason,
    });

    this.events.fire('error', { taskId, error });
    this.events.fire('finished', { taskId, state: 'failed' });
  }

  private rejectRequest(taskId: TaskId, validationError: RequestValidationError): void {
    const error = ErrorClassifier.createValidationError(validationError);

    this.logger.warn(`Rejected task ${taskId}: ${validationError.message}`);
    this.logger.event('translation.failed', {
      taskId,
      errorKind: error.kind,
      attempts: 0,
      reason: 'notRetryable',
    });

    // Deferred so that callers receive the task id before its events.
    const notice = setImmediate(() => {
      this.rejectionNotices.delete(notice);
      this.events.fire('error', { taskId, error });
      this.events.fire('finished', { taskId, state: 'failed' });
    });
    this.rejectionNotices.add(notice);
  }

  private clearAttempt(taskId: TaskId): void {
    this.activeTasks.delete(taskId);

    const timer = this.timeoutTimers.get(taskId);

    if (timer) {
      clearTimeout(timer);
      this.timeoutTimers.delete(taskId);
    }
  }

  private releaseTask(taskId: TaskId): boolean {
    const worker = this.activeTasks.get(taskId);
    const hadState = this.retryStates.delete(taskId);

    worker?.cancel();
    this.clearAttempt(taskId);

    const retryTimer = this.retryTimers.get(taskId);

    if (retryTimer) {
      clearTimeout(retryTimer);
      this.retryTimers.delete(taskId);
    }

    return Boolean(worker) || hadState;
  }
}
