import type { ClientConfiguration } from '../types/config';
import type { LanguageDetector, Translator } from '../types/translation';
import { OpenAITranslationClient, type FetchFunction } from '../services/OpenAITranslationClient';
import { ScriptLanguageDetector } from '../services/ScriptLanguageDetector';
import { TranslationOrchestrator } from '../services/TranslationOrchestrator';
import { AppLogger } from '../utils/logger';
import { getClientConfiguration } from '../utils/config';
import type { Disposable } from '../utils/disposable';

export interface RuntimeOptions {
  configuration?: ClientConfiguration;
  env?: NodeJS.ProcessEnv;
  logStream?: NodeJS.WritableStream;
  translator?: Translator;
  languageDetector?: LanguageDetector;
  fetch?: FetchFunction;
}

export interface Runtime extends Disposable {
  readonly configuration: ClientConfiguration;
  readonly logger: AppLogger;
  readonly orchestrator: TranslationOrchestrator;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const configuration = options.configuration ?? getClientConfiguration(options.env);
  const logger = new AppLogger('translation-orchestrator', {
    stream: options.logStream,
    verbose: configuration.verboseLogging,
  });
  const translator =
    options.translator ??
    new OpenAITranslationClient(configuration.provider, logger, { fetch: options.fetch });
  const languageDetector = options.languageDetector ?? new ScriptLanguageDetector(logger);
  const orchestrator = new TranslationOrchestrator({
    configuration: configuration.orchestration,
    translator,
    languageDetector,
    logger,
  });

  return {
    configuration,
    logger,
    orchestrator,
    dispose: () => {
      orchestrator.dispose();
      logger.dispose();
    },
  };
}
