import { ModelUnavailableError } from '@/domain/errors';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AnthropicLLMAdapter } from '../AnthropicLLMAdapter';

const fetchMock = vi.fn();

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

describe('AnthropicLLMAdapter', () => {
  let adapter: AnthropicLLMAdapter;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    adapter = new AnthropicLLMAdapter({
      apiKey: 'test-api-key',
      model: 'claude-3-5-sonnet-20241022',
      maxTokens: 4096,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('constructor', () => {
    it('should create adapter with valid config', () => {
      expect(adapter.getProviderName()).toBe('Anthropic');
      expect(adapter.getModelName()).toBe('claude-3-5-sonnet-20241022');
    });

    it('should throw error if API key is empty', () => {
      expect(() => new AnthropicLLMAdapter({ apiKey: '' })).toThrow('Anthropic API key is required');
    });

    it('should throw error if API key is whitespace', () => {
      expect(() => new AnthropicLLMAdapter({ apiKey: '   ' })).toThrow(
        'Anthropic API key is required',
      );
    });
  });

  describe('complete', () => {
    it('should make successful API call', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          id: 'msg_123',
          type: 'message',
          role: 'assistant',
          content: [{ type: 'text', text: 'Q1. What is ' }, { type: 'text', text: 'gravity?' }],
          model: 'claude-3-5-haiku-20241022',
          stop_reason: 'end_turn',
          usage: { input_tokens: 10, output_tokens: 20 },
        }),
      );

      const result = await adapter.complete('Generate questions', 'claude-3-5-haiku-20241022', {
        temperature: 0.5,
      });

      expect(result.content).toBe('Q1. What is gravity?');
      expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 20 });

      expect(fetchMock).toHaveBeenCalledWith(
        'https://api.anthropic.com/v1/messages',
        expect.objectContaining({
          method: 'POST',
          headers: {
            'x-api-key': 'test-api-key',
            'anthropic-version': '2023-06-01',
            'content-type': 'application/json',
          },
        }),
      );
      const body = JSON.parse(fetchMock.mock.calls[0][1].body);
      expect(body).toEqual({
        model: 'claude-3-5-haiku-20241022',
        messages: [{ role: 'user', content: 'Generate questions' }],
        max_tokens: 4096,
        temperature: 0.5,
      });
    });

    it('should use the configured model when none is given', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ content: [{ type: 'text', text: 'ok' }] }));

      await adapter.complete('prompt', '');

      const body = JSON.parse(fetchMock.mock.calls[0][1].body);
      expect(body.model).toBe('claude-3-5-sonnet-20241022');
    });

    it('should pass the abort signal to fetch', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ content: [] }));
      const controller = new AbortController();

      const result = await adapter.complete('prompt', 'model', { signal: controller.signal });

      expect(result.content).toBe('');
      expect(fetchMock.mock.calls[0][1].signal).toBe(controller.signal);
    });
  });

  describe('error handling', () => {
    it('should report network failures as ModelUnavailableError', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(adapter.complete('prompt', 'model')).rejects.toThrow(
        'Anthropic API unreachable: fetch failed',
      );
    });

    it('should report server errors as ModelUnavailableError', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'overloaded' }, 529));

      await expect(adapter.complete('prompt', 'model')).rejects.toBeInstanceOf(ModelUnavailableError);
    });

    it('should keep client errors as plain errors', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'invalid x-api-key' }, 401));

      const error = await adapter.complete('prompt', 'model').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(Error);
      expect(error).not.toBeInstanceOf(ModelUnavailableError);
      expect(error).toHaveProperty('message', 'Anthropic API error (401): {"error":"invalid x-api-key"}');
    });

    it('should reject malformed response bodies', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ unexpected: true }));

      await expect(adapter.complete('prompt', 'model')).rejects.toThrow('Unexpected Anthropic API response');
    });
  });
});
