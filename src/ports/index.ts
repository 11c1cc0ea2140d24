// Port interfaces - abstractions for external dependencies
export type { IStorageAdapter } from './IStorageAdapter';
export type { ILLMProvider, LLMCompletionOptions, LLMResponse } from './ILLMProvider';
