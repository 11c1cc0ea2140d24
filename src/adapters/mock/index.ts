export { InMemoryStorageAdapter } from './InMemoryStorageAdapter';
export { MockLLMAdapter, renderMockQuestions } from './MockLLMAdapter';
export type { LLMCallRecord, MockLLMConfig, MockResponder } from './MockLLMAdapter';
