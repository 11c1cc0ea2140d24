// Types
export type {
  CorrectionResult,
  Difficulty,
  GenerationConfig,
  GenerationConfigInput,
  GenerationProgress,
  GenerationRun,
  GenerationSettings,
  GenerationStage,
  MultipleChoiceQuestion,
  MultipleSelectionQuestion,
  ParseResult,
  ProgressCallback,
  QuestionOfType,
  QuestionOption,
  QuestionRecord,
  QuestionType,
  RejectedQuestion,
  ShortAnswerQuestion,
  SkippedSegment,
  TrueFalseQuestion,
} from './types';
export { DEFAULT_GENERATION_SETTINGS, DIFFICULTIES, QUESTION_TYPES } from './types';

// Config
export {
  DEFAULT_LANGUAGE,
  DEFAULT_MODEL_ID,
  MAX_REQUESTED_COUNT,
  MIN_REQUESTED_COUNT,
  createGenerationConfig,
  formatIssues,
} from './config';

// Prompts
export {
  ANSWER_MARKERS,
  OPTION_COUNTS,
  QUESTION_TYPE_LABELS,
  SELECT_ALL_SUFFIX,
  buildGenerationPrompt,
  formatExample,
  optionLetters,
} from './prompts';

// Parsing & correction
export { parseQuestionResponse, parseQuestions } from './parser';
export type { CorrectorOptions } from './corrector';
export {
  DEFAULT_CORRECTOR_OPTIONS,
  correctQuestions,
  filterQuestions,
  repairQuestion,
  validateQuestion,
} from './corrector';

// Orchestration
export { GenerationOrchestrator, splitIntoBatches } from './orchestrator';

// Export
export type { ExportDocument, ExportMetadata, ExportedQuestion } from './export';
export { toExportDocument, toExportedQuestion } from './export';
