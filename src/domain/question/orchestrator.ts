import { ModelUnavailableError } from '@/domain/errors';
import type { QuestionMonitor } from '@/domain/monitor/QuestionMonitor';
import { buildContentSections } from '@/domain/retrieval/retriever';
import type { VectorIndex } from '@/domain/vectorIndex/VectorIndex';
import type { ILLMProvider, LLMResponse } from '@/ports/ILLMProvider';
import { createGenerationConfig } from './config';
import { correctQuestions } from './corrector';
import { parseQuestionResponse } from './parser';
import { buildGenerationPrompt } from './prompts';
import {
  DEFAULT_GENERATION_SETTINGS,
  type GenerationConfig,
  type GenerationConfigInput,
  type GenerationRun,
  type GenerationSettings,
  type GenerationStage,
  type ProgressCallback,
  type QuestionRecord,
} from './types';

/**
 * Split a question count into per-call batch sizes: 25 by 10 → [10, 10, 5]
 */
export function splitIntoBatches(count: number, batchSize: number): number[] {
  const size = Math.max(1, batchSize);
  const batches: number[] = [];
  for (let remaining = count; remaining > 0; remaining -= size) {
    batches.push(Math.min(size, remaining));
  }
  return batches;
}

interface RoundOutcome {
  accepted: QuestionRecord[];
  parsedCount: number;
  /** Model failure that ended the round early */
  failure: ModelUnavailableError | null;
}

/**
 * Runs one generation request end to end
 *
 * Stages per round:
 * 1. Retrieving - Build one bounded context per batch from the index
 * 2. Prompting - Call the model for each batch under a timeout
 * 3. Parsing - Read question records from the raw output
 * 4. Filtering - Drop structurally unsound and duplicate records
 *
 * When a round leaves a shortfall, further rounds (up to `maxRounds`) ask
 * for the missing questions. Nothing is fabricated to fill a shortfall.
 * Runs share no mutable state, so one orchestrator can serve concurrent requests.
 */
export class GenerationOrchestrator {
  private readonly settings: GenerationSettings;

  constructor(
    private index: VectorIndex,
    private llmProvider: ILLMProvider,
    private monitor: QuestionMonitor | null = null,
    settings: Partial<GenerationSettings> = {},
  ) {
    this.settings = {
      ...DEFAULT_GENERATION_SETTINGS,
      ...settings,
      batchSizes: { ...DEFAULT_GENERATION_SETTINGS.batchSizes, ...settings.batchSizes },
    };
  }

  /**
   * Generate questions for a request
   *
   * @param input - Request; validated before any retrieval or model call
   * @param onProgress - Optional callback for stage updates
   * @throws InvalidConfigError if the request is invalid
   * @throws ModelUnavailableError if the model fails before any question is accepted
   */
  async generate(input: GenerationConfigInput, onProgress?: ProgressCallback): Promise<GenerationRun> {
    const config = createGenerationConfig(input);
    const report = (stage: GenerationStage, round: number, message: string): void => {
      onProgress?.({ stage, round, message });
    };

    const accepted: QuestionRecord[] = [];
    let generatedCount = 0;
    let rounds = 0;

    try {
      for (let round = 1; round <= this.settings.maxRounds; round++) {
        const shortfall = config.requestedCount - accepted.length;
        if (shortfall <= 0) break;
        if (round > 1) {
          console.warn(
            `Generation shortfall: ${accepted.length}/${config.requestedCount} accepted, requesting ${shortfall} more (round ${round})`,
          );
        }

        const outcome = await this.runRound(config, shortfall, round, accepted, report);
        rounds = round;
        generatedCount += outcome.parsedCount;
        accepted.push(...outcome.accepted);

        if (outcome.failure) {
          if (accepted.length === 0) {
            throw outcome.failure;
          }
          console.warn(`Model failed in round ${round}, keeping ${accepted.length} accepted questions: ${outcome.failure.message}`);
          if (round > 1) break;
        }
      }
    } catch (error) {
      report('failed', rounds, error instanceof Error ? error.message : String(error));
      throw error;
    }

    const questions = accepted.slice(0, config.requestedCount);
    if (questions.length < config.requestedCount) {
      console.warn(
        `Returning ${questions.length} of ${config.requestedCount} requested ${config.questionType} questions`,
      );
    }

    const run: GenerationRun = Object.freeze({
      config,
      questions: Object.freeze(questions),
      generatedCount,
      filteredCount: questions.length,
      rounds,
      timestamp: Date.now(),
    });

    if (this.monitor) {
      await this.monitor.record(run);
    }
    report('complete', rounds, `Generated ${questions.length} of ${config.requestedCount} questions`);
    return run;
  }

  // ============ Rounds ============

  private async runRound(
    config: GenerationConfig,
    count: number,
    round: number,
    acceptedSoFar: readonly QuestionRecord[],
    report: (stage: GenerationStage, round: number, message: string) => void,
  ): Promise<RoundOutcome> {
    const batches = splitIntoBatches(count, this.settings.batchSizes[config.questionType]);

    report('retrieving', round, `Retrieving content for ${batches.length} batch(es)...`);
    const sections = buildContentSections(this.index, {
      topic: config.topic,
      sectionCount: batches.length,
      chunksPerSection: this.settings.chunksPerSection,
      maxLength: this.settings.contextMaxLength,
    });

    const accepted: QuestionRecord[] = [];
    let parsedCount = 0;

    for (let i = 0; i < batches.length; i++) {
      if (acceptedSoFar.length + accepted.length >= config.requestedCount) break;

      const prompt = buildGenerationPrompt(config, sections[i % sections.length], batches[i]);

      report('prompting', round, `Requesting ${batches[i]} questions (batch ${i + 1}/${batches.length})...`);
      let response: LLMResponse;
      try {
        response = await this.callModel(prompt, config.modelId);
      } catch (error) {
        if (error instanceof ModelUnavailableError) {
          return { accepted, parsedCount, failure: error };
        }
        throw error;
      }

      report('parsing', round, 'Parsing model output...');
      const parsed = parseQuestionResponse(response.content, config.questionType);
      parsedCount += parsed.questions.length;

      report('filtering', round, `Checking ${parsed.questions.length} parsed questions...`);
      const { accepted: batchAccepted } = correctQuestions(parsed.questions, {
        minModelAnswerLength: this.settings.minModelAnswerLength,
        seenQuestionTexts: [...acceptedSoFar, ...accepted].map((question) => question.questionText),
      });
      accepted.push(...batchAccepted);
    }

    return { accepted, parsedCount, failure: null };
  }

  /**
   * Call the model, aborting and failing with ModelUnavailableError after `timeoutMs`
   */
  private async callModel(prompt: string, modelId: string): Promise<LLMResponse> {
    const controller = new AbortController();
    const { timeoutMs } = this.settings;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ModelUnavailableError(`Model "${modelId}" did not respond within ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.llmProvider.complete(prompt, modelId, {
          temperature: this.settings.temperature,
          maxTokens: this.settings.maxTokens,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
