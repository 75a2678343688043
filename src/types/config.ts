export interface OrchestrationConfiguration {
  debounceMs: number;
  maxRetries: number;
  memoryErrorMaxRetries: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
  backoffMultiplier: number;
  translationTimeoutMs: number;
  maxTextLength: number;
  poolSize?: number;
}

export interface ProviderConfiguration {
  apiBaseUrl: string;
  apiKey?: string;
  model: string;
  requestTimeoutMs: number;
}

export interface ClientConfiguration {
  verboseLogging: boolean;
  orchestration: OrchestrationConfiguration;
  provider: ProviderConfiguration;
}
