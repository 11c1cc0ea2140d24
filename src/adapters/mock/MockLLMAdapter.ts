import { ModelUnavailableError } from '@/domain/errors';
import {
  ANSWER_MARKERS,
  OPTION_COUNTS,
  QUESTION_TYPE_LABELS,
  SELECT_ALL_SUFFIX,
  optionLetters,
} from '@/domain/question/prompts';
import { QUESTION_TYPES } from '@/domain/question/types';
import type { QuestionType } from '@/domain/question/types';
import type { ILLMProvider, LLMCompletionOptions, LLMResponse } from '@/ports/ILLMProvider';

/**
 * Record of an LLM call for testing
 */
export interface LLMCallRecord {
  prompt: string;
  modelId: string;
  options?: LLMCompletionOptions;
  timestamp: number;
}

/**
 * Computes a response for a prompt; may throw to simulate failures
 */
export type MockResponder = (prompt: string, modelId: string, callIndex: number) => string | Promise<string>;

export interface MockLLMConfig {
  /** Default model name */
  model: string;
  /** Simulated latency per call (ms); honours the abort signal */
  latencyMs: number;
}

const DEFAULT_MOCK_LLM_CONFIG: MockLLMConfig = {
  model: 'mock-model',
  latencyMs: 0,
};

const REQUEST_PATTERN = /^Generate (\d+) (.+?) questions? based on/m;
const TOPIC_PATTERN = /^Focus specifically on the topic: (.+)$/m;

/** About four characters per token */
function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function questionTypeFromLabel(label: string): QuestionType | null {
  return QUESTION_TYPES.find((type) => QUESTION_TYPE_LABELS[type] === label) ?? null;
}

/**
 * Render well-formed output in the prompt's format
 */
export function renderMockQuestions(
  questionType: QuestionType,
  count: number,
  topic: string,
  batch = 1,
): string {
  const blocks: string[] = [];
  const letters = optionLetters(OPTION_COUNTS[questionType] ?? 0);

  for (let i = 1; i <= count; i++) {
    const subject = `${QUESTION_TYPE_LABELS[questionType]} question ${i} about ${topic} (batch ${batch})`;
    const options = letters.map((letter) => `${letter}. Option ${letter} for question ${i}`);

    switch (questionType) {
      case 'multiple_choice':
        blocks.push([`Q${i}. Sample ${subject}?`, ...options, `${ANSWER_MARKERS.single}: A`].join('\n'));
        break;
      case 'multiple_selection':
        blocks.push(
          [
            `Q${i}. Sample ${subject}? ${SELECT_ALL_SUFFIX}`,
            ...options,
            `${ANSWER_MARKERS.multiple}: A, C`,
          ].join('\n'),
        );
        break;
      case 'true_false':
        blocks.push([`Q${i}. Sample ${subject} is a true statement.`, `${ANSWER_MARKERS.single}: True`].join('\n'));
        break;
      case 'short_answer':
        blocks.push(
          [
            `Q${i}. Sample ${subject}?`,
            `${ANSWER_MARKERS.model}: A brief model answer for question ${i} about ${topic}.`,
          ].join('\n'),
        );
        break;
    }
  }

  return blocks.join('\n\n');
}

/**
 * Mock implementation of ILLMProvider for testing
 *
 * By default it reads the requested count, type and topic back from the
 * prompt and answers with deterministic, well-formed questions. Tests can
 * queue scripted responses or failures, or install a responder.
 */
export class MockLLMAdapter implements ILLMProvider {
  private config: MockLLMConfig;
  private queued: Array<string | Error> = [];
  private responder: MockResponder | null = null;
  private callHistory: LLMCallRecord[] = [];

  constructor(config?: Partial<MockLLMConfig>) {
    this.config = { ...DEFAULT_MOCK_LLM_CONFIG, ...config };
  }

  async complete(prompt: string, modelId: string, options?: LLMCompletionOptions): Promise<LLMResponse> {
    const callIndex = this.callHistory.length;
    this.callHistory.push({ prompt, modelId, options, timestamp: Date.now() });

    await this.simulateLatency(options?.signal);

    const content = await this.nextResponse(prompt, modelId, callIndex);
    return {
      content,
      usage: {
        inputTokens: estimateTokens(prompt),
        outputTokens: estimateTokens(content),
      },
    };
  }

  getProviderName(): string {
    return 'mock';
  }

  getModelName(): string {
    return this.config.model;
  }

  // ============ Test Helpers ============

  /**
   * Queue a raw response (or an error to throw) for the next call
   */
  _queueResponse(response: string | Error): void {
    this.queued.push(response);
  }

  /**
   * Answer every call without a queued response through `responder`
   */
  _setResponder(responder: MockResponder | null): void {
    this.responder = responder;
  }

  _setLatency(latencyMs: number): void {
    this.config = { ...this.config, latencyMs };
  }

  /**
   * Get call history for assertions
   */
  _getCallHistory(): LLMCallRecord[] {
    return [...this.callHistory];
  }

  /**
   * Clear call history
   */
  _clearCallHistory(): void {
    this.callHistory = [];
  }

  // ============ Private Methods ============

  private async nextResponse(prompt: string, modelId: string, callIndex: number): Promise<string> {
    const queued = this.queued.shift();
    if (queued instanceof Error) {
      throw queued;
    }
    if (queued !== undefined) {
      return queued;
    }
    if (this.responder) {
      return this.responder(prompt, modelId, callIndex);
    }
    return this.defaultResponse(prompt, callIndex);
  }

  private defaultResponse(prompt: string, callIndex: number): string {
    const request = REQUEST_PATTERN.exec(prompt);
    const questionType = request ? questionTypeFromLabel(request[2]) : null;
    if (!request || !questionType) {
      return 'I can only write quiz questions.';
    }
    const topic = TOPIC_PATTERN.exec(prompt)?.[1] ?? 'general';
    return renderMockQuestions(questionType, Number(request[1]), topic, callIndex + 1);
  }

  private simulateLatency(signal: AbortSignal | undefined): Promise<void> {
    if (this.config.latencyMs <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(resolve, this.config.latencyMs);
      signal?.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          reject(new ModelUnavailableError('Mock model call aborted'));
        },
        { once: true },
      );
    });
  }
}
