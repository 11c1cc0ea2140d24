import { ModelUnavailableError } from '@/domain/errors';
import type { ILLMProvider, LLMCompletionOptions, LLMResponse } from '@/ports';
import { z } from 'zod';

/**
 * Anthropic API request body for message creation.
 */
interface AnthropicMessageRequest {
  model: string;
  messages: Array<{ role: 'user'; content: string }>;
  max_tokens: number;
  temperature?: number;
}

/**
 * Anthropic API response for non-streaming requests.
 */
const messageResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

/**
 * Configuration for the Anthropic LLM adapter.
 */
export interface AnthropicLLMConfig {
  apiKey: string;
  model?: string; // Default: claude-3-5-sonnet-20241022
  maxTokens?: number; // Default: 4096
  apiVersion?: string; // Default: 2023-06-01
  baseUrl?: string; // Default: https://api.anthropic.com/v1
}

/**
 * Adapter for Anthropic's Messages API over fetch.
 * Network failures, rate limits and 5xx responses surface as ModelUnavailableError.
 */
export class AnthropicLLMAdapter implements ILLMProvider {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly defaultMaxTokens: number;
  private readonly apiVersion: string;
  private readonly baseUrl: string;

  constructor(config: AnthropicLLMConfig) {
    if (!config.apiKey || config.apiKey.trim().length === 0) {
      throw new Error('Anthropic API key is required');
    }
    this.apiKey = config.apiKey;
    this.model = config.model ?? 'claude-3-5-sonnet-20241022';
    this.defaultMaxTokens = config.maxTokens ?? 4096;
    this.apiVersion = config.apiVersion ?? '2023-06-01';
    this.baseUrl = (config.baseUrl ?? 'https://api.anthropic.com/v1').replace(/\/+$/, '');
  }

  async complete(prompt: string, modelId: string, options?: LLMCompletionOptions): Promise<LLMResponse> {
    const model = modelId || this.model;
    const requestBody = this.buildRequestBody(prompt, model, options);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/messages`, {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify(requestBody),
        signal: options?.signal,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ModelUnavailableError(`Anthropic API unreachable: ${reason}`, error);
    }

    if (!response.ok) {
      const errorText = await response.text();
      const message = `Anthropic API error (${response.status}): ${errorText}`;
      if (response.status === 429 || response.status >= 500) {
        throw new ModelUnavailableError(message);
      }
      throw new Error(message);
    }

    const parsed = messageResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Anthropic API response: ${parsed.error.message}`);
    }

    const { content, usage } = parsed.data;
    return {
      content: content.map((block) => (block.type === 'text' ? (block.text ?? '') : '')).join(''),
      usage: usage
        ? {
            inputTokens: usage.input_tokens,
            outputTokens: usage.output_tokens,
          }
        : undefined,
    };
  }

  getProviderName(): string {
    return 'Anthropic';
  }

  getModelName(): string {
    return this.model;
  }

  /**
   * Build the request body for the Anthropic API.
   */
  private buildRequestBody(
    prompt: string,
    model: string,
    options: LLMCompletionOptions | undefined,
  ): AnthropicMessageRequest {
    const requestBody: AnthropicMessageRequest = {
      model,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: options?.maxTokens ?? this.defaultMaxTokens,
    };

    if (options?.temperature !== undefined) {
      requestBody.temperature = options.temperature;
    }

    return requestBody;
  }

  /**
   * Build headers for Anthropic API requests.
   */
  private buildHeaders(): Record<string, string> {
    return {
      'x-api-key': this.apiKey,
      'anthropic-version': this.apiVersion,
      'content-type': 'application/json',
    };
  }
}
