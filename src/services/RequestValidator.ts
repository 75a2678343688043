import { z } from 'zod';

import type { TranslationRequest } from '../types/translation';
import { AUTO_DETECT } from '../constants/languages';
import { countCharacters } from '../utils/text';

export class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RequestValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RequestValidationError);
    }
  }
}

export function createRequestSchema(maxTextLength: number) {
  return z.object({
    text: z
      .string()
      .refine((value) => value.trim().length > 0, { message: 'Text to translate is empty.' })
      .refine((value) => countCharacters(value.trim()) <= maxTextLength, {
        message: `Text is too long (maximum ${maxTextLength} characters).`,
      }),
    sourceLanguage: z.string().trim().min(1, 'Source language is required.'),
    targetLanguage: z
      .string()
      .trim()
      .min(1, 'Target language is required.')
      .refine((value) => value !== AUTO_DETECT, {
        message: 'Target language cannot be auto-detected.',
      }),
  });
}

export class RequestValidator {
  private readonly schema: ReturnType<typeof createRequestSchema>;

  constructor(maxTextLength: number) {
    this.schema = createRequestSchema(maxTextLength);
  }

  /**
   * Returns the request with trimmed text and language codes, or throws a
   * `RequestValidationError` listing every problem found.
   */
  validate(request: TranslationRequest): TranslationRequest {
    const result = this.schema.safeParse(request);

    if (!result.success) {
      const issues = result.error.issues.map((issue) => issue.message);
      throw new RequestValidationError(issues.join(' '), issues, { cause: result.error });
    }

    return {
      text: result.data.text.trim(),
      sourceLanguage: result.data.sourceLanguage,
      targetLanguage: result.data.targetLanguage,
    };
  }
}
