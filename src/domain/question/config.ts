import { InvalidConfigError } from '@/domain/errors';
import { z } from 'zod';
import { DIFFICULTIES, QUESTION_TYPES } from './types';
import type { GenerationConfig, GenerationConfigInput } from './types';

export const MIN_REQUESTED_COUNT = 1;
export const MAX_REQUESTED_COUNT = 100;
export const DEFAULT_MODEL_ID = 'llama3';
export const DEFAULT_LANGUAGE = 'English';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim() ?? '';
    return trimmed.length > 0 ? trimmed : null;
  });

const generationConfigSchema = z.object({
  questionType: z.enum(QUESTION_TYPES),
  requestedCount: z.number().int().min(MIN_REQUESTED_COUNT).max(MAX_REQUESTED_COUNT),
  topic: optionalText,
  difficulty: z.enum(DIFFICULTIES).default('medium'),
  language: z.string().trim().min(1).default(DEFAULT_LANGUAGE),
  modelId: z.string().trim().min(1).default(DEFAULT_MODEL_ID),
  sourceName: optionalText,
});

/**
 * Format zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate a generation request and freeze it.
 * Blank topics collapse to null; omitted fields take their defaults.
 *
 * @throws InvalidConfigError listing every problem found
 */
export function createGenerationConfig(input: GenerationConfigInput): GenerationConfig {
  const parsed = generationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(formatIssues(parsed.error));
  }
  return Object.freeze({ ...parsed.data });
}
