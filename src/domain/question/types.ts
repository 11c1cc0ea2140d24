/**
 * Question Generation Domain Types
 *
 * Records flowing through the prompt → parse → correct pipeline,
 * the immutable request config and the per-request run summary.
 */

// ============ Question Types ============

export const QUESTION_TYPES = [
  'multiple_choice',
  'multiple_selection',
  'true_false',
  'short_answer',
] as const;

/**
 * Question format types
 */
export type QuestionType = (typeof QUESTION_TYPES)[number];

export const DIFFICULTIES = ['low', 'medium', 'high'] as const;

/**
 * Difficulty levels
 */
export type Difficulty = (typeof DIFFICULTIES)[number];

/**
 * A lettered answer option
 */
export interface QuestionOption {
  /** Uppercase letter, A first */
  letter: string;
  text: string;
}

interface QuestionBase {
  questionText: string;
}

export interface MultipleChoiceQuestion extends QuestionBase {
  questionType: 'multiple_choice';
  options: QuestionOption[];
  /** Letter of the single correct option */
  correctAnswer: string | null;
}

export interface MultipleSelectionQuestion extends QuestionBase {
  questionType: 'multiple_selection';
  options: QuestionOption[];
  /** Letters of every correct option */
  correctAnswers: string[];
}

export interface TrueFalseQuestion extends QuestionBase {
  questionType: 'true_false';
  /** "True" or "False" once parsed from a recognizable answer line */
  correctAnswer: string | null;
}

export interface ShortAnswerQuestion extends QuestionBase {
  questionType: 'short_answer';
  modelAnswer: string;
}

/**
 * One question, tagged by type.
 * Parsed records may be structurally invalid; corrector output never is.
 */
export type QuestionRecord =
  | MultipleChoiceQuestion
  | MultipleSelectionQuestion
  | TrueFalseQuestion
  | ShortAnswerQuestion;

export type QuestionOfType<T extends QuestionType> = Extract<QuestionRecord, { questionType: T }>;

// ============ Parse / Correct Results ============

/**
 * A response segment the parser could not turn into a record
 */
export interface SkippedSegment {
  segment: string;
  reason: string;
}

export interface ParseResult {
  questions: QuestionRecord[];
  skipped: SkippedSegment[];
}

export interface RejectedQuestion {
  record: QuestionRecord;
  reason: string;
}

export interface CorrectionResult {
  accepted: QuestionRecord[];
  rejected: RejectedQuestion[];
}

// ============ Generation Types ============

/**
 * Validated, immutable generation request
 */
export interface GenerationConfig {
  readonly questionType: QuestionType;
  /** Integer in [1, 100] */
  readonly requestedCount: number;
  readonly topic: string | null;
  readonly difficulty: Difficulty;
  readonly language: string;
  readonly modelId: string;
  /** Document identity shown in exports */
  readonly sourceName: string | null;
}

/**
 * Unvalidated generation request, e.g. straight from a form or CLI flags
 */
export interface GenerationConfigInput {
  questionType: string;
  requestedCount: number;
  topic?: string | null;
  difficulty?: string;
  language?: string;
  modelId?: string;
  sourceName?: string | null;
}

/**
 * Summary of one completed generation request
 */
export interface GenerationRun {
  readonly config: GenerationConfig;
  readonly questions: readonly QuestionRecord[];
  /** Records parsed from model output across all rounds */
  readonly generatedCount: number;
  /** Always equal to questions.length */
  readonly filteredCount: number;
  /** Model rounds performed, retry included */
  readonly rounds: number;
  /** Completion time (ms since epoch) */
  readonly timestamp: number;
}

export type GenerationStage =
  | 'idle'
  | 'retrieving'
  | 'prompting'
  | 'parsing'
  | 'filtering'
  | 'complete'
  | 'failed';

export interface GenerationProgress {
  stage: GenerationStage;
  round: number;
  message: string;
}

export type ProgressCallback = (progress: GenerationProgress) => void;

/**
 * Tunables of the generation orchestrator
 */
export interface GenerationSettings {
  /** Total model rounds including shortfall retries */
  maxRounds: number;
  /** Per model call */
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  /** Character budget of one prompt context */
  contextMaxLength: number;
  /** Retrieved chunks per content section */
  chunksPerSection: number;
  /** Shortest acceptable short-answer model answer */
  minModelAnswerLength: number;
  /** Questions requested per model call */
  batchSizes: Record<QuestionType, number>;
}

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  maxRounds: 2,
  timeoutMs: 120_000,
  temperature: 0.7,
  maxTokens: 4096,
  contextMaxLength: 4000,
  chunksPerSection: 5,
  minModelAnswerLength: 10,
  batchSizes: {
    multiple_choice: 10,
    multiple_selection: 8,
    true_false: 15,
    short_answer: 12,
  },
};
