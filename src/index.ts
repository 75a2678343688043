export { createRuntime } from './activation/createRuntime';
export type { Runtime, RuntimeOptions } from './activation/createRuntime';
export { TranslationOrchestrator } from './services/TranslationOrchestrator';
export type { TranslationOrchestratorOptions } from './services/TranslationOrchestrator';
export { ErrorClassifier, ERROR_GUIDANCE } from './services/ErrorClassifier';
export { OpenAITranslationClient, TranslationProviderError } from './services/OpenAITranslationClient';
export type { FetchFunction } from './services/OpenAITranslationClient';
export { ScriptLanguageDetector } from './services/ScriptLanguageDetector';
export { RequestValidationError, RequestValidator } from './services/RequestValidator';
export { RetryPolicy } from './services/RetryPolicy';
export type { RetryDecision } from './services/RetryPolicy';
export { WorkerPool } from './services/WorkerPool';
export { AUTO_DETECT, SUPPORTED_LANGUAGES, describeLanguage, findLanguage } from './constants/languages';
export type { LanguageDefinition } from './constants/languages';
export { ConfigurationError, getClientConfiguration } from './utils/config';
export { AppLogger } from './utils/logger';
export type { LoggerOptions } from './utils/logger';
export type { OrchestratorEventName, OrchestratorEvents } from './messaging/channel';
export type * from './types/config';
export type * from './types/translation';
