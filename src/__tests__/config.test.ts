import { AnthropicLLMAdapter } from '@/adapters/anthropic/AnthropicLLMAdapter';
import { OpenAILLMAdapter } from '@/adapters/openai/OpenAILLMAdapter';
import { InvalidConfigError } from '@/domain/errors';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_SETTINGS,
  LOCAL_API_KEY_PLACEHOLDER,
  createLLMProvider,
  loadSettings,
  toChunkingOptions,
  toGenerationSettings,
} from '../config';

describe('loadSettings', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it('should read and coerce QUIZFORGE_ variables', () => {
    const settings = loadSettings({
      QUIZFORGE_PROVIDER: 'anthropic',
      QUIZFORGE_API_KEY: 'test-key',
      QUIZFORGE_MODEL: ' phi3 ',
      QUIZFORGE_TIMEOUT_MS: '5000',
      QUIZFORGE_TEMPERATURE: '0.2',
      QUIZFORGE_CHUNK_OVERLAP: '0',
      PATH: '/usr/bin',
    });

    expect(settings).toEqual({
      ...DEFAULT_SETTINGS,
      provider: 'anthropic',
      apiKey: 'test-key',
      model: 'phi3',
      timeoutMs: 5000,
      temperature: 0.2,
      chunkOverlap: 0,
    });
  });

  it('should treat blank variables as unset', () => {
    expect(loadSettings({ QUIZFORGE_MAX_ROUNDS: '  ', QUIZFORGE_BASE_URL: '' })).toEqual(DEFAULT_SETTINGS);
  });

  it('should name every invalid variable', () => {
    try {
      loadSettings({ QUIZFORGE_PROVIDER: 'cohere', QUIZFORGE_MAX_ROUNDS: 'two', QUIZFORGE_BASE_URL: 'localhost' });
      expect.unreachable('settings should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigError);
      if (error instanceof InvalidConfigError) {
        expect(error.issues.map((issue) => issue.split(':')[0])).toEqual([
          'QUIZFORGE_PROVIDER',
          'QUIZFORGE_BASE_URL',
          'QUIZFORGE_MAX_ROUNDS',
        ]);
      }
    }
  });

  it('should reject an overlap that is not smaller than the chunk size', () => {
    expect(() => loadSettings({ QUIZFORGE_CHUNK_SIZE: '100', QUIZFORGE_CHUNK_OVERLAP: '100' })).toThrow(
      'QUIZFORGE_CHUNK_OVERLAP: must be smaller than the chunk size (100)',
    );
  });
});

describe('derived options', () => {
  it('should map settings onto the orchestrator and chunker', () => {
    expect(toGenerationSettings(DEFAULT_SETTINGS)).toEqual({
      timeoutMs: 120_000,
      maxRounds: 2,
      temperature: 0.7,
      contextMaxLength: 4000,
    });
    expect(toChunkingOptions(DEFAULT_SETTINGS)).toEqual({ chunkSize: 2000, chunkOverlap: 50 });
  });
});

describe('createLLMProvider', () => {
  it('should build an OpenAI-compatible adapter with a placeholder key for local servers', () => {
    const provider = createLLMProvider(DEFAULT_SETTINGS);

    expect(provider).toBeInstanceOf(OpenAILLMAdapter);
    if (provider instanceof OpenAILLMAdapter) {
      expect(provider.getConfig().apiKey).toBe(LOCAL_API_KEY_PLACEHOLDER);
      expect(provider.getConfig().baseURL).toBe('http://localhost:11434/v1');
    }
  });

  it('should pass a configured endpoint through', () => {
    const provider = createLLMProvider({ ...DEFAULT_SETTINGS, baseUrl: 'http://models.internal:8080/v1' });

    expect(provider instanceof OpenAILLMAdapter && provider.getConfig().baseURL).toBe('http://models.internal:8080/v1');
  });

  it('should build the Anthropic adapter', () => {
    const provider = createLLMProvider({
      ...DEFAULT_SETTINGS,
      provider: 'anthropic',
      apiKey: 'test-key',
      model: 'claude-test',
    });

    expect(provider).toBeInstanceOf(AnthropicLLMAdapter);
    expect(provider.getModelName()).toBe('claude-test');
  });

  it('should require a key for the Anthropic provider', () => {
    expect(() => createLLMProvider({ ...DEFAULT_SETTINGS, provider: 'anthropic' })).toThrow(InvalidConfigError);
  });
});
