import { ZodError } from 'zod';

import type { TranslationError, TranslationErrorKind } from '../types/translation';
import { TranslationProviderError } from './OpenAITranslationClient';
import { RequestValidationError } from './RequestValidator';

interface ErrorGuidance {
  cause: string;
  solution: string;
  isRetryable: boolean;
}

export const ERROR_GUIDANCE: Readonly<Record<TranslationErrorKind, ErrorGuidance>> = {
  network: {
    cause: 'The connection to the translation service failed.',
    solution: 'Check your network connection and try again in a moment.',
    isRetryable: true,
  },
  memory: {
    cause: 'The system ran out of memory while translating.',
    solution: 'Close other applications or try a shorter text.',
    isRetryable: true,
  },
  model: {
    cause: 'The translation model is unavailable.',
    solution: 'Restart the application. If the problem persists, check that the model is installed and has enough disk space.',
    isRetryable: false,
  },
  timeout: {
    cause: 'The translation took too long.',
    solution: 'The text may be too long. Split it into smaller parts or try again later.',
    isRetryable: true,
  },
  validation: {
    cause: 'The input text is not valid for translation.',
    solution: 'Check the text and the selected languages, then try again.',
    isRetryable: false,
  },
  unknown: {
    cause: 'An unexpected error occurred.',
    solution: 'Try again in a moment. Restart the application if the problem persists.',
    isRetryable: true,
  },
};

const MEMORY_ERROR_CODES = new Set(['ENOMEM', 'ERR_MEMORY_ALLOCATION_FAILED']);

export class ErrorClassifier {
  static readonly TIMEOUT_PATTERNS: readonly RegExp[] = [/timed? ?out/i, /timeout/i, /deadline exceeded/i];

  static readonly MEMORY_PATTERNS: readonly RegExp[] = [
    /out of memory/i,
    /\bOOM\b/i,
    /MemoryError/i,
    /CUDA out of memory/i,
    /MPS out of memory/i,
    /cannot allocate/i,
    /allocation failed/i,
  ];

  static readonly NETWORK_PATTERNS: readonly RegExp[] = [
    /connection/i,
    /network/i,
    /socket/i,
    /ECONNREFUSED/i,
    /ECONNRESET/i,
    /ENOTFOUND/i,
    /EAI_AGAIN/i,
    /fetch failed/i,
  ];

  static readonly MODEL_PATTERNS: readonly RegExp[] = [
    /Model not loaded/i,
    /model.*not.*initialized/i,
    /failed to load.*model/i,
    /model.*failed/i,
  ];

  static classify(error: unknown, message?: string, trace?: string): TranslationError {
    const resolvedMessage = message ?? ErrorClassifier.describe(error);
    const kind = ErrorClassifier.determineKind(error, resolvedMessage);

    return ErrorClassifier.build(kind, resolvedMessage, {
      trace: trace ?? (error instanceof Error ? error.stack : undefined),
      originalError: error,
    });
  }

  static classifyMessage(message: string, trace?: string): TranslationError {
    return ErrorClassifier.classify(undefined, message, trace);
  }

  static createTimeoutError(timeoutMs?: number): TranslationError {
    const message =
      timeoutMs === undefined
        ? 'Translation timed out'
        : `Translation timed out after ${timeoutMs}ms`;

    return ErrorClassifier.build('timeout', message);
  }

  static createValidationError(error: RequestValidationError): TranslationError {
    return ErrorClassifier.build('validation', error.message, { originalError: error });
  }

  private static build(
    kind: TranslationErrorKind,
    message: string,
    extras?: { trace?: string; originalError?: unknown },
  ): TranslationError {
    const guidance = ERROR_GUIDANCE[kind];

    return Object.freeze({
      kind,
      message,
      cause: guidance.cause,
      solution: guidance.solution,
      isRetryable: guidance.isRetryable,
      trace: extras?.trace,
      originalError: extras?.originalError,
    });
  }

  private static determineKind(error: unknown, message: string): TranslationErrorKind {
    if (error instanceof RequestValidationError || error instanceof ZodError) {
      return 'validation';
    }

    if (ErrorClassifier.isMemoryIndicator(error)) {
      return 'memory';
    }

    if (ErrorClassifier.isTimeoutIndicator(error)) {
      return 'timeout';
    }

    if (ErrorClassifier.isConnectionError(error)) {
      return ErrorClassifier.matches(ErrorClassifier.TIMEOUT_PATTERNS, message) ? 'timeout' : 'network';
    }

    if (ErrorClassifier.matches(ErrorClassifier.TIMEOUT_PATTERNS, message)) {
      return 'timeout';
    }

    if (ErrorClassifier.matches(ErrorClassifier.MEMORY_PATTERNS, message)) {
      return 'memory';
    }

    if (ErrorClassifier.matches(ErrorClassifier.NETWORK_PATTERNS, message)) {
      return 'network';
    }

    if (ErrorClassifier.matches(ErrorClassifier.MODEL_PATTERNS, message)) {
      return 'model';
    }

    return 'unknown';
  }

  private static isMemoryIndicator(error: unknown): boolean {
    const code = ErrorClassifier.readCode(error);

    if (code && MEMORY_ERROR_CODES.has(code)) {
      return true;
    }

    return error instanceof RangeError && /allocation failed|invalid (?:array|string) length/i.test(error.message);
  }

  private static isTimeoutIndicator(error: unknown): boolean {
    if (error instanceof TranslationProviderError) {
      return error.code === 'timeout';
    }

    if (error instanceof Error && error.name === 'TimeoutError') {
      return true;
    }

    return ErrorClassifier.readCode(error) === 'ETIMEDOUT';
  }

  private static isConnectionError(error: unknown): boolean {
    if (error instanceof TranslationProviderError) {
      return error.code === 'network';
    }

    if (!(error instanceof Error)) {
      return false;
    }

    const code = ErrorClassifier.readCode(error);

    if (code && /^E[A-Z_]+$/.test(code)) {
      return true;
    }

    if ('syscall' in error && typeof error.syscall === 'string') {
      return true;
    }

    return error.cause instanceof Error && ErrorClassifier.isConnectionError(error.cause);
  }

  private static readCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) {
      return undefined;
    }

    return typeof error.code === 'string' ? error.code : undefined;
  }

  private static matches(patterns: readonly RegExp[], message: string): boolean {
    return patterns.some((pattern) => pattern.test(message));
  }

  private static describe(error: unknown): string {
    if (error instanceof Error) {
      return error.message || error.name;
    }

    if (typeof error === 'string') {
      return error;
    }

    return 'Translation failed.';
  }
}
