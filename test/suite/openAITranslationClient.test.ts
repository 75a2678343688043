import * as assert from 'assert';
import { suite, test } from 'mocha';

import { ErrorClassifier } from '../../src/services/ErrorClassifier';
import {
  OpenAITranslationClient,
  TranslationProviderError,
  type FetchFunction,
} from '../../src/services/OpenAITranslationClient';
import type { ProviderConfiguration } from '../../src/types/config';
import { createTestLogger } from './helpers';

const configuration: ProviderConfiguration = {
  apiBaseUrl: 'http://localhost:11434/v1/',
  apiKey: 'test-secret',
  model: 'test-model',
  requestTimeoutMs: 1000,
};

interface CapturedRequest {
  url: string;
  init?: RequestInit;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function completion(content: string | null): unknown {
  return {
    id: 'chatcmpl-1',
    model: 'test-model',
    choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content } }],
  };
}

function createClient(
  fetchImpl: FetchFunction,
  overrides: Partial<ProviderConfiguration> = {},
): OpenAITranslationClient {
  const { logger } = createTestLogger();
  return new OpenAITranslationClient({ ...configuration, ...overrides }, logger, { fetch: fetchImpl });
}

async function captureProviderError(promise: Promise<string>): Promise<TranslationProviderError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof TranslationProviderError) {
      return error;
    }

    throw error;
  }

  throw new Error('Expected a TranslationProviderError.');
}

suite('OpenAITranslationClient', () => {
  test('posts a chat completion request and returns the trimmed content', async () => {
    const requests: CapturedRequest[] = [];
    const progress: Array<[number, string]> = [];
    const client = createClient(async (url, init) => {
      requests.push({ url, init });
      return jsonResponse(completion('  안녕하세요  '));
    });

    const result = await client.translate('Hello', 'en', 'ko', (percentage, message) => {
      progress.push([percentage, message]);
    });

    assert.strictEqual(result, '안녕하세요');
    assert.deepStrictEqual(progress, [
      [30, 'Waiting for the model...'],
      [90, 'Processing translation...'],
    ]);
    assert.strictEqual(requests.length, 1);
    assert.strictEqual(requests[0].url, 'http://localhost:11434/v1/chat/completions');
    assert.strictEqual(requests[0].init?.method, 'POST');

    const headers = new Headers(requests[0].init?.headers);
    assert.strictEqual(headers.get('Authorization'), 'Bearer test-secret');
    assert.strictEqual(headers.get('Content-Type'), 'application/json');

    const rawBody = requests[0].init?.body;
    assert.strictEqual(typeof rawBody, 'string');

    const body: unknown = JSON.parse(String(rawBody));
    assert.deepStrictEqual(body, {
      model: 'test-model',
      messages: [
        {
          role: 'system',
          content:
            "You are a professional translator.\nTranslate the user's text from English into Korean.\nPreserve line breaks, numbers, names and formatting. Respond only with the translation, without quotes or commentary.",
        },
        { role: 'user', content: 'Hello' },
      ],
      temperature: 0.2,
      top_p: 1,
    });
  });

  test('omits the authorization header without an api key', async () => {
    let authorization: string | null = 'unset';
    const client = createClient(
      async (_url, init) => {
        authorization = new Headers(init?.headers).get('Authorization');
        return jsonResponse(completion('ok'));
      },
      { apiKey: undefined, apiBaseUrl: 'http://localhost:8080/v1/chat/completions' },
    );

    await client.translate('Hello', 'en', 'ko');

    assert.strictEqual(authorization, null);
  });

  test('maps a missing model to a non-retryable model error', async () => {
    const client = createClient(async () => new Response('model missing', { status: 404 }));

    const error = await captureProviderError(client.translate('Hello', 'en', 'ko'));

    assert.strictEqual(error.code, 'modelUnavailable');
    assert.strictEqual(error.status, 404);
    assert.strictEqual(
      error.message,
      'Model not loaded: test-model is not available on the endpoint (404): model missing',
    );

    const classified = ErrorClassifier.classify(error);
    assert.strictEqual(classified.kind, 'model');
    assert.strictEqual(classified.isRetryable, false);
  });

  test('maps server errors to retryable failures', async () => {
    const client = createClient(async () => new Response('', { status: 503 }));

    const error = await captureProviderError(client.translate('Hello', 'en', 'ko'));

    assert.strictEqual(error.code, 'server');
    assert.strictEqual(error.retryable, true);
    assert.strictEqual(error.message, 'Translation API responded with 503.');
    assert.strictEqual(ErrorClassifier.classify(error).isRetryable, true);
  });

  test('maps rejected credentials to a model error', async () => {
    const client = createClient(async () => new Response('invalid key', { status: 401 }));

    const error = await captureProviderError(client.translate('Hello', 'en', 'ko'));

    assert.strictEqual(error.code, 'authentication');
    assert.strictEqual(ErrorClassifier.classify(error).kind, 'model');
  });

  test('wraps connection failures as network errors', async () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:11434'), { code: 'ECONNREFUSED' });
    const client = createClient(async () => {
      throw new TypeError('fetch failed', { cause: refused });
    });

    const error = await captureProviderError(client.translate('Hello', 'en', 'ko'));

    assert.strictEqual(error.code, 'network');
    assert.strictEqual(error.message, 'Network request failed (ECONNREFUSED): fetch failed');
    assert.strictEqual(ErrorClassifier.classify(error).kind, 'network');
  });

  test('aborts requests that exceed the request timeout', async () => {
    const client = createClient(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        }),
      { requestTimeoutMs: 20 },
    );

    const error = await captureProviderError(client.translate('Hello', 'en', 'ko'));

    assert.strictEqual(error.code, 'timeout');
    assert.strictEqual(error.message, 'Translation request timed out after 20ms.');
    assert.strictEqual(ErrorClassifier.classify(error).kind, 'timeout');
  });

  test('rejects empty completions', async () => {
    const client = createClient(async () => jsonResponse(completion('   ')));

    const error = await captureProviderError(client.translate('Hello', 'en', 'ko'));

    assert.strictEqual(error.code, 'invalidResponse');
    assert.strictEqual(error.message, 'Translation model failed to return any content.');
  });
});
