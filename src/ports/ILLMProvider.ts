/**
 * Port for LLM (Large Language Model) completions.
 * The generation pipeline only needs prompt in, free text out.
 */

/**
 * Response from an LLM completion.
 */
export interface LLMResponse {
  content: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * Options for LLM completion requests.
 */
export interface LLMCompletionOptions {
  temperature?: number; // 0.0 to 1.0, controls randomness
  maxTokens?: number; // Max tokens to generate
  signal?: AbortSignal; // Fired when the caller stops waiting (e.g. timeout)
}

/**
 * Port interface for LLM providers.
 * Implementations handle API-specific details (authentication, endpoints, etc.)
 * and report connectivity failures as ModelUnavailableError.
 */
export interface ILLMProvider {
  /**
   * Send a single prompt to the given model and receive the full completion text.
   */
  complete(prompt: string, modelId: string, options?: LLMCompletionOptions): Promise<LLMResponse>;

  /**
   * Get the name of the LLM provider (e.g., "OpenAI").
   */
  getProviderName(): string;

  /**
   * Get the default model name used when a request does not name one.
   */
  getModelName(): string;
}
