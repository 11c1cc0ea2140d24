import { ModelUnavailableError } from '@/domain/errors';
import type { ILLMProvider, LLMCompletionOptions, LLMResponse } from '@/ports/ILLMProvider';
import OpenAI from 'openai';

/**
 * Configuration for the OpenAI-compatible chat adapter
 */
export interface OpenAILLMConfig {
	apiKey: string;
	/** Any OpenAI-compatible endpoint, e.g. a local Ollama server */
	baseURL: string;
	/** Model used when a request names none */
	model: string;
	maxTokens: number;
	maxRetries: number;
	retryBaseDelay: number;
}

export const DEFAULT_OPENAI_LLM_CONFIG: Omit<OpenAILLMConfig, 'apiKey'> = {
	baseURL: 'http://localhost:11434/v1',
	model: 'llama3',
	maxTokens: 4096,
	maxRetries: 2,
	retryBaseDelay: 1000,
};

/**
 * Client errors that retrying cannot fix
 */
const NON_RETRYABLE_STATUS_CODES = [400, 401, 403, 404, 422];

const CONNECTION_ERROR_NAMES = ['APIConnectionError', 'APIConnectionTimeoutError'];
const TRANSIENT_MESSAGE_FRAGMENTS = ['network', 'connection error', 'econnrefused', 'fetch failed', 'timed out'];
const ABORT_ERROR_NAMES = ['AbortError', 'APIUserAbortError'];

/**
 * Check if error is an API error with status code (duck typing, works with mocks)
 */
function isAPIError(error: unknown): error is { status: number; message: string } {
	return (
		typeof error === 'object' &&
		error !== null &&
		'status' in error &&
		typeof error.status === 'number'
	);
}

function errorName(error: unknown): string {
	return error instanceof Error ? error.name : '';
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Chat-completions provider over the official `openai` SDK
 *
 * Each prompt is sent as one user message. Rate limits, server errors and
 * connection failures are retried with exponential backoff and then reported
 * as ModelUnavailableError; other client errors are rethrown unchanged.
 */
export class OpenAILLMAdapter implements ILLMProvider {
	private client: OpenAI;
	private config: OpenAILLMConfig;

	constructor(config: Partial<OpenAILLMConfig> & { apiKey: string }) {
		this.config = { ...DEFAULT_OPENAI_LLM_CONFIG, ...config };
		this.client = new OpenAI({
			apiKey: this.config.apiKey,
			baseURL: this.config.baseURL,
			maxRetries: 0,
		});
	}

	async complete(prompt: string, modelId: string, options: LLMCompletionOptions = {}): Promise<LLMResponse> {
		let lastError: unknown = null;

		for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
			try {
				return await this.callChatAPI(prompt, modelId || this.config.model, options);
			} catch (error) {
				lastError = error;

				if (this.isAbortError(error) || options.signal?.aborted) {
					throw new ModelUnavailableError(`Request to model "${modelId}" was aborted`, error);
				}
				if (!this.isRetryableError(error)) {
					throw error;
				}
				if (attempt < this.config.maxRetries) {
					await this.sleep(this.config.retryBaseDelay * 2 ** attempt);
				}
			}
		}

		throw new ModelUnavailableError(
			`Model "${modelId}" at ${this.config.baseURL} is unavailable: ${errorMessage(lastError)}`,
			lastError,
		);
	}

	getProviderName(): string {
		return 'openai';
	}

	getModelName(): string {
		return this.config.model;
	}

	getConfig(): OpenAILLMConfig {
		return { ...this.config };
	}

	// ============ Private Methods ============

	private async callChatAPI(prompt: string, model: string, options: LLMCompletionOptions): Promise<LLMResponse> {
		const response = await this.client.chat.completions.create(
			{
				model,
				messages: [{ role: 'user', content: prompt }],
				temperature: options.temperature,
				max_tokens: options.maxTokens ?? this.config.maxTokens,
			},
			{ signal: options.signal },
		);

		return {
			content: response.choices[0]?.message?.content ?? '',
			usage: response.usage
				? {
						inputTokens: response.usage.prompt_tokens,
						outputTokens: response.usage.completion_tokens,
					}
				: undefined,
		};
	}

	private isRetryableError(error: unknown): boolean {
		if (isAPIError(error)) {
			// Rate limit (429) and server errors (5xx) are retryable
			if (error.status === 429) return true;
			if (error.status >= 500) return true;
			if (NON_RETRYABLE_STATUS_CODES.includes(error.status)) return false;
		}

		if (CONNECTION_ERROR_NAMES.includes(errorName(error))) {
			return true;
		}

		// Network errors are retryable
		const message = errorMessage(error).toLowerCase();
		return TRANSIENT_MESSAGE_FRAGMENTS.some((fragment) => message.includes(fragment));
	}

	private isAbortError(error: unknown): boolean {
		return ABORT_ERROR_NAMES.includes(errorName(error));
	}

	private sleep(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}
