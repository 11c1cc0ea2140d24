import type { GenerationRun, QuestionRecord, QuestionType } from './types';

/**
 * Question as written to an export file
 */
export interface ExportedQuestion {
  question_text: string;
  question_type: QuestionType;
  options?: { letter: string; text: string }[];
  correct_answer?: string | string[];
  model_answer?: string;
}

export interface ExportMetadata {
  pdf_filename: string | null;
  question_type: QuestionType;
  topic: string | null;
  difficulty: string;
  language: string;
  requested_count: number;
  generated_count: number;
  filtered_count: number;
  /** ISO-8601 */
  timestamp: string;
}

export interface ExportDocument {
  metadata: ExportMetadata;
  questions: ExportedQuestion[];
}

export function toExportedQuestion(question: QuestionRecord): ExportedQuestion {
  const base = { question_text: question.questionText, question_type: question.questionType };
  switch (question.questionType) {
    case 'multiple_choice':
      return {
        ...base,
        options: question.options.map(({ letter, text }) => ({ letter, text })),
        correct_answer: question.correctAnswer ?? '',
      };
    case 'multiple_selection':
      return {
        ...base,
        options: question.options.map(({ letter, text }) => ({ letter, text })),
        correct_answer: [...question.correctAnswers],
      };
    case 'true_false':
      return { ...base, correct_answer: question.correctAnswer ?? '' };
    case 'short_answer':
      return { ...base, model_answer: question.modelAnswer };
  }
}

/**
 * Serializable snapshot of a run for download or archival
 */
export function toExportDocument(run: GenerationRun): ExportDocument {
  const { config } = run;
  return {
    metadata: {
      pdf_filename: config.sourceName,
      question_type: config.questionType,
      topic: config.topic,
      difficulty: config.difficulty,
      language: config.language,
      requested_count: config.requestedCount,
      generated_count: run.generatedCount,
      filtered_count: run.filteredCount,
      timestamp: new Date(run.timestamp).toISOString(),
    },
    questions: run.questions.map(toExportedQuestion),
  };
}
