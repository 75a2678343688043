import type { ProviderConfiguration } from '../types/config';
import type { ProgressCallback, ProviderErrorCode, Translator } from '../types/translation';
import { DEFAULT_TRANSLATION_PROMPT } from '../constants/prompts';
import { describeLanguage } from '../constants/languages';
import { AppLogger } from '../utils/logger';

interface ChatCompletionResponse {
  id?: string;
  model?: string;
  choices?: Array<{
    index: number;
    finish_reason: string | null;
    message?: {
      role: 'assistant';
      content: string | null;
    };
  }>;
}

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

export class TranslationProviderError extends Error {
  readonly code: ProviderErrorCode;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(
    message: string,
    options: { code: ProviderErrorCode; status?: number; retryable?: boolean; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = 'TranslationProviderError';
    this.code = options.code;
    this.status = options.status;
    this.retryable = options.retryable ?? false;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TranslationProviderError);
    }
  }
}

/**
 * Translator backed by an OpenAI-compatible `/chat/completions` endpoint, such as a
 * locally hosted model server. Error messages are phrased so that the classifier's
 * message patterns recognise them.
 */
export class OpenAITranslationClient implements Translator {
  private readonly fetchImpl: FetchFunction;
  private readonly promptTemplate: string;

  constructor(
    private readonly configuration: ProviderConfiguration,
    private readonly logger: AppLogger,
    options?: { fetch?: FetchFunction; promptTemplate?: string },
  ) {
    this.fetchImpl = options?.fetch ?? ((input, init) => fetch(input, init));
    this.promptTemplate = options?.promptTemplate ?? DEFAULT_TRANSLATION_PROMPT;
  }

  async translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
    onProgress?: ProgressCallback,
  ): Promise<string> {
    const url = this.buildEndpointUrl(this.configuration.apiBaseUrl);
    const instructions = this.interpolateInstructions(this.promptTemplate, {
      sourceLanguage: describeLanguage(sourceLanguage),
      targetLanguage: describeLanguage(targetLanguage),
    });

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.configuration.requestTimeoutMs);

    const started = Date.now();
    onProgress?.(30, 'Waiting for the model...');

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify({
          model: this.configuration.model,
          messages: [
            { role: 'system', content: instructions },
            { role: 'user', content: text },
          ],
          temperature: 0.2,
          top_p: 1,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await this.safeReadBody(response);
        throw this.mapStatusToError(response.status, errorBody);
      }

      const body = (await response.json()) as ChatCompletionResponse;
      const content = body.choices?.[0]?.message?.content?.trim();

      if (!content) {
        throw new TranslationProviderError('Translation model failed to return any content.', {
          code: 'invalidResponse',
          retryable: false,
        });
      }

      onProgress?.(90, 'Processing translation...');
      this.logger.debug(
        `Endpoint ${body.model ?? this.configuration.model} answered in ${Date.now() - started}ms.`,
      );

      return content;
    } catch (error) {
      if (error instanceof TranslationProviderError) {
        throw error;
      }

      if (timedOut) {
        throw new TranslationProviderError(
          `Translation request timed out after ${this.configuration.requestTimeoutMs}ms.`,
          { code: 'timeout', retryable: true, cause: error },
        );
      }

      if (error instanceof Error) {
        throw this.normalizeError(error);
      }

      throw new TranslationProviderError('Translation failed due to an unknown error.', {
        code: 'unknown',
        retryable: false,
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };

    if (this.configuration.apiKey) {
      headers.Authorization = `Bearer ${this.configuration.apiKey}`;
    }

    return headers;
  }

  private buildEndpointUrl(apiBaseUrl: string): string {
    const trimmed = apiBaseUrl.replace(/\/+$/, '');

    if (/\/chat\/completions$/i.test(trimmed)) {
      return trimmed;
    }

    return `${trimmed}/chat/completions`;
  }

  private async safeReadBody(response: Response): Promise<string | undefined> {
    try {
      const body = (await response.text()).trim();
      return body || undefined;
    } catch (error) {
      this.logger.warn('Failed to read error response body.');
      return undefined;
    }
  }

  private interpolateInstructions(
    template: string,
    values: { sourceLanguage: string; targetLanguage: string },
  ): string {
    const replace = (needle: string, replacement: string): ((value: string) => string) => {
      const pattern = new RegExp(`{{\\s*${needle}\\s*}}`, 'gi');
      return (value: string) => value.replace(pattern, () => replacement);
    };

    const withSource = replace('sourceLanguage', values.sourceLanguage)(template);
    return replace('targetLanguage', values.targetLanguage)(withSource).trim();
  }

  private normalizeError(error: Error): TranslationProviderError {
    const message = error.message || 'Translation failed.';
    const causeCode =
      error.cause instanceof Error && 'code' in error.cause && typeof error.cause.code === 'string'
        ? error.cause.code
        : undefined;
    const normalized = `${message} ${causeCode ?? ''}`.toLowerCase();

    if (
      normalized.includes('etimedout') ||
      normalized.includes('timeout') ||
      normalized.includes('timed out')
    ) {
      return new TranslationProviderError(message, {
        code: 'timeout',
        retryable: true,
        cause: error,
      });
    }

    if (
      normalized.includes('econnrefused') ||
      normalized.includes('econnreset') ||
      normalized.includes('enotfound') ||
      normalized.includes('network') ||
      normalized.includes('fetch failed') ||
      normalized.includes('socket hang up')
    ) {
      return new TranslationProviderError(
        causeCode ? `Network request failed (${causeCode}): ${message}` : message,
        {
          code: 'network',
          retryable: true,
          cause: error,
        },
      );
    }

    return new TranslationProviderError(message, {
      code: 'unknown',
      retryable: false,
      cause: error,
    });
  }

  private mapStatusToError(status: number, body: string | undefined): TranslationProviderError {
    const detail = body ? `: ${body}` : '.';

    if (status === 401 || status === 403) {
      return new TranslationProviderError(
        `Translation model request failed: the endpoint rejected the credentials (${status})${detail}`,
        { code: 'authentication', status, retryable: false },
      );
    }

    if (status === 404) {
      return new TranslationProviderError(
        `Model not loaded: ${this.configuration.model} is not available on the endpoint (404)${detail}`,
        { code: 'modelUnavailable', status, retryable: false },
      );
    }

    if (status === 408 || status === 504) {
      return new TranslationProviderError(`Translation request timed out (${status})${detail}`, {
        code: 'timeout',
        status,
        retryable: true,
      });
    }

    if (status === 429) {
      return new TranslationProviderError(`Translation API is rate limited (429)${detail}`, {
        code: 'rateLimit',
        status,
        retryable: true,
      });
    }

    if (status >= 500 && status < 600) {
      return new TranslationProviderError(`Translation API responded with ${status}${detail}`, {
        code: 'server',
        status,
        retryable: true,
      });
    }

    return new TranslationProviderError(`Translation API responded with ${status}${detail}`, {
      code: 'unknown',
      status,
      retryable: false,
    });
  }
}
