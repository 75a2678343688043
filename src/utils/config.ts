import { z } from 'zod';

import type { ClientConfiguration } from '../types/config';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly keys: readonly string[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

const integer = (minimum: number) => z.coerce.number().int().min(minimum);

const environmentSchema = z.object({
  TRANSLATOR_DEBOUNCE_MS: z.preprocess(blankToUndefined, integer(0).default(500)),
  TRANSLATOR_MAX_RETRIES: z.preprocess(blankToUndefined, integer(0).default(3)),
  TRANSLATOR_MEMORY_ERROR_MAX_RETRIES: z.preprocess(blankToUndefined, integer(0).default(1)),
  TRANSLATOR_INITIAL_RETRY_DELAY_MS: z.preprocess(blankToUndefined, integer(0).default(1000)),
  TRANSLATOR_MAX_RETRY_DELAY_MS: z.preprocess(blankToUndefined, integer(0).default(10000)),
  TRANSLATOR_BACKOFF_MULTIPLIER: z.preprocess(blankToUndefined, z.coerce.number().min(1).default(2)),
  TRANSLATOR_TIMEOUT_MS: z.preprocess(blankToUndefined, integer(1).default(60000)),
  TRANSLATOR_MAX_TEXT_LENGTH: z.preprocess(blankToUndefined, integer(1).default(2000)),
  TRANSLATOR_POOL_SIZE: z.preprocess(blankToUndefined, integer(1).optional()),
  TRANSLATOR_API_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('http://localhost:11434/v1'),
  ),
  TRANSLATOR_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  TRANSLATOR_MODEL: z.preprocess(blankToUndefined, z.string().default('translategemma')),
  TRANSLATOR_REQUEST_TIMEOUT_MS: z.preprocess(blankToUndefined, integer(1).default(120000)),
  TRANSLATOR_VERBOSE: z.preprocess(
    (value) => {
      const normalized = blankToUndefined(value);
      return typeof normalized === 'string' ? normalized.toLowerCase() : normalized;
    },
    z
      .string()
      .refine((value) => TRUTHY.includes(value) || FALSY.includes(value), {
        message: `Expected one of ${[...TRUTHY, ...FALSY].join(', ')}.`,
      })
      .default('false')
      .transform((value) => TRUTHY.includes(value)),
  ),
});

/**
 * Reads the client configuration from environment variables. Blank values fall
 * back to their defaults; invalid values raise a `ConfigurationError` naming every
 * offending variable.
 */
export function getClientConfiguration(env: NodeJS.ProcessEnv = process.env): ClientConfiguration {
  const result = environmentSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues.map((issue) => ({
      key: issue.path.map(String).join('.') || 'environment',
      message: issue.message,
    }));
    const keys = Array.from(new Set(problems.map((problem) => problem.key)));
    const details = problems.map((problem) => `${problem.key}: ${problem.message}`).join('; ');

    throw new ConfigurationError(`Invalid configuration (${details})`, keys, { cause: result.error });
  }

  const values = result.data;

  return {
    verboseLogging: values.TRANSLATOR_VERBOSE,
    orchestration: {
      debounceMs: values.TRANSLATOR_DEBOUNCE_MS,
      maxRetries: values.TRANSLATOR_MAX_RETRIES,
      memoryErrorMaxRetries: values.TRANSLATOR_MEMORY_ERROR_MAX_RETRIES,
      initialRetryDelayMs: values.TRANSLATOR_INITIAL_RETRY_DELAY_MS,
      maxRetryDelayMs: values.TRANSLATOR_MAX_RETRY_DELAY_MS,
      backoffMultiplier: values.TRANSLATOR_BACKOFF_MULTIPLIER,
      translationTimeoutMs: values.TRANSLATOR_TIMEOUT_MS,
      maxTextLength: values.TRANSLATOR_MAX_TEXT_LENGTH,
      poolSize: values.TRANSLATOR_POOL_SIZE,
    },
    provider: {
      apiBaseUrl: values.TRANSLATOR_API_BASE_URL,
      apiKey: values.TRANSLATOR_API_KEY,
      model: values.TRANSLATOR_MODEL,
      requestTimeoutMs: values.TRANSLATOR_REQUEST_TIMEOUT_MS,
    },
  };
}
