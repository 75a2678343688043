import { Writable } from 'stream';

import type { OrchestratorEventName, OrchestratorEvents } from '../../src/messaging/channel';
import type { TranslationOrchestrator } from '../../src/services/TranslationOrchestrator';
import type { OrchestrationConfiguration } from '../../src/types/config';
import type { LanguageDetector, ProgressCallback, Translator } from '../../src/types/translation';
import { AppLogger } from '../../src/utils/logger';

export class MemoryStream extends Writable {
  private readonly chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }

  get lines(): string[] {
    return this.text.split('\n').filter((line) => line.length > 0);
  }
}

export function createTestLogger(verbose = false): { logger: AppLogger; stream: MemoryStream } {
  const stream = new MemoryStream();
  return { logger: new AppLogger('test', { stream, verbose }), stream };
}

export function createOrchestrationConfiguration(
  overrides: Partial<OrchestrationConfiguration> = {},
): OrchestrationConfiguration {
  return {
    debounceMs: 20,
    maxRetries: 3,
    memoryErrorMaxRetries: 1,
    initialRetryDelayMs: 10,
    maxRetryDelayMs: 40,
    backoffMultiplier: 2,
    translationTimeoutMs: 1000,
    maxTextLength: 2000,
    poolSize: 2,
    ...overrides,
  };
}

export interface TranslateCall {
  text: string;
  sourceLanguage: string;
  targetLanguage: string;
}

type TranslateBehaviour = (call: TranslateCall, callIndex: number, onProgress?: ProgressCallback) => Promise<string>;

export class StubTranslator implements Translator {
  readonly calls: TranslateCall[] = [];

  constructor(private readonly behaviour: TranslateBehaviour) {}

  translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
    onProgress?: ProgressCallback,
  ): Promise<string> {
    const call = { text, sourceLanguage, targetLanguage };
    this.calls.push(call);
    return this.behaviour(call, this.calls.length - 1, onProgress);
  }
}

export class StubDetector implements LanguageDetector {
  readonly inputs: string[] = [];

  constructor(private readonly language: string | undefined) {}

  detect(text: string): string | undefined {
    this.inputs.push(text);
    return this.language;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((onResolve, onReject) => {
    resolve = onResolve;
    reject = onReject;
  });

  return { promise, resolve, reject };
}

export function createSequentialIds(prefix = 'task'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export type RecordedEvent = {
  [K in OrchestratorEventName]: { type: K; payload: OrchestratorEvents[K] };
}[OrchestratorEventName];

export function recordEvents(orchestrator: TranslationOrchestrator): RecordedEvent[] {
  const events: RecordedEvent[] = [];

  orchestrator.on('started', (payload) => events.push({ type: 'started', payload }));
  orchestrator.on('progress', (payload) => events.push({ type: 'progress', payload }));
  orchestrator.on('complete', (payload) => events.push({ type: 'complete', payload }));
  orchestrator.on('error', (payload) => events.push({ type: 'error', payload }));
  orchestrator.on('retrying', (payload) => events.push({ type: 'retrying', payload }));
  orchestrator.on('finished', (payload) => events.push({ type: 'finished', payload }));

  return events;
}

export function waitForFinished(
  orchestrator: TranslationOrchestrator,
  taskId: string,
  timeoutMs = 2000,
): Promise<OrchestratorEvents['finished']> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      subscription.dispose();
      reject(new Error(`Task ${taskId} did not finish within ${timeoutMs}ms.`));
    }, timeoutMs);

    const subscription = orchestrator.on('finished', (payload) => {
      if (payload.taskId !== taskId) {
        return;
      }

      clearTimeout(timer);
      subscription.dispose();
      resolve(payload);
    });
  });
}
