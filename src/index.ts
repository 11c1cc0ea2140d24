// Ports
export type { ILLMProvider, IStorageAdapter, LLMCompletionOptions, LLMResponse } from './ports';

// Errors
export type { QuizForgeErrorCode } from './domain/errors';
export {
  CorruptStateError,
  EmptyCorpusError,
  InvalidConfigError,
  ModelUnavailableError,
  NotFittedError,
  QuizForgeError,
  isQuizForgeError,
} from './domain/errors';

// Domain
export * from './domain/chunking';
export * from './domain/vectorIndex';
export * from './domain/retrieval';
export * from './domain/question';
export * from './domain/monitor';
export * from './domain/llm';

// Adapters
export { AnthropicLLMAdapter } from './adapters/anthropic/AnthropicLLMAdapter';
export { FileStorageAdapter } from './adapters/filesystem/FileStorageAdapter';
export { DEFAULT_OPENAI_LLM_CONFIG, OpenAILLMAdapter } from './adapters/openai/OpenAILLMAdapter';
export type { OpenAILLMConfig } from './adapters/openai/OpenAILLMAdapter';

// Configuration
export type { ProviderName, QuizForgeSettings } from './config';
export {
  DEFAULT_SETTINGS,
  LOCAL_API_KEY_PLACEHOLDER,
  PROVIDERS,
  createLLMProvider,
  loadSettings,
  toChunkingOptions,
  toGenerationSettings,
  toMonitorOptions,
  toVectorizerOptions,
} from './config';
