import { AnthropicLLMAdapter } from '@/adapters/anthropic/AnthropicLLMAdapter';
import { OpenAILLMAdapter } from '@/adapters/openai/OpenAILLMAdapter';
import type { ChunkingOptions } from '@/domain/chunking';
import { InvalidConfigError } from '@/domain/errors';
import type { MonitorOptions } from '@/domain/monitor';
import { formatIssues } from '@/domain/question/config';
import type { GenerationSettings } from '@/domain/question/types';
import type { VectorizerOptions } from '@/domain/vectorIndex/types';
import type { ILLMProvider } from '@/ports/ILLMProvider';
import { z } from 'zod';

export const PROVIDERS = ['openai', 'anthropic'] as const;

export type ProviderName = (typeof PROVIDERS)[number];

/**
 * Runtime settings, read from QUIZFORGE_* environment variables
 */
export interface QuizForgeSettings {
  provider: ProviderName;
  /** Empty for local OpenAI-compatible servers that need no key */
  apiKey: string;
  /** null keeps the adapter's own endpoint */
  baseUrl: string | null;
  /** Model used when a request names none */
  model: string;
  timeoutMs: number;
  maxRounds: number;
  temperature: number;
  chunkSize: number;
  chunkOverlap: number;
  maxFeatures: number;
  contextMaxLength: number;
  monitorRetention: number;
}

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: QuizForgeSettings = {
  provider: 'openai',
  apiKey: '',
  baseUrl: null,
  model: 'llama3',
  timeoutMs: 120_000,
  maxRounds: 2,
  temperature: 0.7,
  chunkSize: 2000,
  chunkOverlap: 50,
  maxFeatures: 5000,
  contextMaxLength: 4000,
  monitorRetention: 50,
};

/** Sent as the key to OpenAI-compatible servers that ignore it */
export const LOCAL_API_KEY_PLACEHOLDER = 'ollama';

const positiveInt = z.coerce.number().int().positive().optional();

const envSchema = z.object({
  QUIZFORGE_PROVIDER: z.enum(PROVIDERS).optional(),
  QUIZFORGE_API_KEY: z.string().optional(),
  QUIZFORGE_BASE_URL: z.string().url().optional(),
  QUIZFORGE_MODEL: z.string().optional(),
  QUIZFORGE_TIMEOUT_MS: positiveInt,
  QUIZFORGE_MAX_ROUNDS: positiveInt,
  QUIZFORGE_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
  QUIZFORGE_CHUNK_SIZE: positiveInt,
  QUIZFORGE_CHUNK_OVERLAP: z.coerce.number().int().min(0).optional(),
  QUIZFORGE_MAX_FEATURES: positiveInt,
  QUIZFORGE_CONTEXT_MAX_LENGTH: positiveInt,
  QUIZFORGE_MONITOR_RETENTION: positiveInt,
});

/**
 * Non-blank QUIZFORGE_* variables, trimmed
 */
function pickVariables(env: Record<string, string | undefined>): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    const trimmed = value?.trim() ?? '';
    if (name.startsWith('QUIZFORGE_') && trimmed.length > 0) {
      picked[name] = trimmed;
    }
  }
  return picked;
}

/**
 * Read settings from the environment over DEFAULT_SETTINGS.
 * Unset or blank variables keep their defaults.
 *
 * @throws InvalidConfigError listing every invalid variable
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): QuizForgeSettings {
  const parsed = envSchema.safeParse(pickVariables(env));
  if (!parsed.success) {
    throw new InvalidConfigError(formatIssues(parsed.error));
  }
  const vars = parsed.data;

  const settings: QuizForgeSettings = {
    provider: vars.QUIZFORGE_PROVIDER ?? DEFAULT_SETTINGS.provider,
    apiKey: vars.QUIZFORGE_API_KEY ?? DEFAULT_SETTINGS.apiKey,
    baseUrl: vars.QUIZFORGE_BASE_URL ?? DEFAULT_SETTINGS.baseUrl,
    model: vars.QUIZFORGE_MODEL ?? DEFAULT_SETTINGS.model,
    timeoutMs: vars.QUIZFORGE_TIMEOUT_MS ?? DEFAULT_SETTINGS.timeoutMs,
    maxRounds: vars.QUIZFORGE_MAX_ROUNDS ?? DEFAULT_SETTINGS.maxRounds,
    temperature: vars.QUIZFORGE_TEMPERATURE ?? DEFAULT_SETTINGS.temperature,
    chunkSize: vars.QUIZFORGE_CHUNK_SIZE ?? DEFAULT_SETTINGS.chunkSize,
    chunkOverlap: vars.QUIZFORGE_CHUNK_OVERLAP ?? DEFAULT_SETTINGS.chunkOverlap,
    maxFeatures: vars.QUIZFORGE_MAX_FEATURES ?? DEFAULT_SETTINGS.maxFeatures,
    contextMaxLength: vars.QUIZFORGE_CONTEXT_MAX_LENGTH ?? DEFAULT_SETTINGS.contextMaxLength,
    monitorRetention: vars.QUIZFORGE_MONITOR_RETENTION ?? DEFAULT_SETTINGS.monitorRetention,
  };

  if (settings.chunkOverlap >= settings.chunkSize) {
    throw new InvalidConfigError([
      `QUIZFORGE_CHUNK_OVERLAP: must be smaller than the chunk size (${settings.chunkSize})`,
    ]);
  }

  return settings;
}

// ============ Derived Options ============

export function toGenerationSettings(settings: QuizForgeSettings): Partial<GenerationSettings> {
  return {
    timeoutMs: settings.timeoutMs,
    maxRounds: settings.maxRounds,
    temperature: settings.temperature,
    contextMaxLength: settings.contextMaxLength,
  };
}

export function toChunkingOptions(settings: QuizForgeSettings): ChunkingOptions {
  return { chunkSize: settings.chunkSize, chunkOverlap: settings.chunkOverlap };
}

export function toVectorizerOptions(settings: QuizForgeSettings): Partial<VectorizerOptions> {
  return { maxFeatures: settings.maxFeatures };
}

export function toMonitorOptions(settings: QuizForgeSettings): MonitorOptions {
  return { retention: settings.monitorRetention };
}

/**
 * Build the model adapter the settings name
 *
 * @throws InvalidConfigError if the anthropic provider has no API key
 */
export function createLLMProvider(settings: QuizForgeSettings): ILLMProvider {
  switch (settings.provider) {
    case 'openai':
      return new OpenAILLMAdapter({
        apiKey: settings.apiKey || LOCAL_API_KEY_PLACEHOLDER,
        model: settings.model,
        ...(settings.baseUrl ? { baseURL: settings.baseUrl } : {}),
      });
    case 'anthropic':
      if (settings.apiKey.length === 0) {
        throw new InvalidConfigError(['QUIZFORGE_API_KEY: required for the anthropic provider']);
      }
      return new AnthropicLLMAdapter({
        apiKey: settings.apiKey,
        model: settings.model,
        ...(settings.baseUrl ? { baseUrl: settings.baseUrl } : {}),
      });
  }
}
