/**
 * Structural quality gate between the parser and the user.
 *
 * Repairs are limited to trimming and normalizing answer sets, so running
 * the filter on its own output changes nothing.
 */

import { optionLetters } from './prompts';
import type { CorrectionResult, QuestionOption, QuestionRecord, RejectedQuestion } from './types';

export interface CorrectorOptions {
  /** Shortest acceptable short-answer model answer after trimming */
  minModelAnswerLength: number;
  /** Question texts accepted earlier in the same request */
  seenQuestionTexts?: Iterable<string>;
}

export const DEFAULT_CORRECTOR_OPTIONS: CorrectorOptions = {
  minModelAnswerLength: 10,
};

const TRUE_FALSE_ANSWERS: ReadonlySet<string> = new Set(['True', 'False']);

function trimOptions(options: QuestionOption[]): QuestionOption[] {
  return options.map((option) => ({ letter: option.letter.trim(), text: option.text.trim() }));
}

/**
 * Normalized copy of a record: trimmed text, sorted unique answer letters
 */
export function repairQuestion(record: QuestionRecord): QuestionRecord {
  const questionText = record.questionText.trim();

  switch (record.questionType) {
    case 'multiple_choice':
      return {
        questionType: record.questionType,
        questionText,
        options: trimOptions(record.options),
        correctAnswer: record.correctAnswer?.trim() ?? null,
      };
    case 'multiple_selection':
      return {
        questionType: record.questionType,
        questionText,
        options: trimOptions(record.options),
        correctAnswers: Array.from(new Set(record.correctAnswers.map((letter) => letter.trim()))).sort(),
      };
    case 'true_false':
      return {
        questionType: record.questionType,
        questionText,
        correctAnswer: record.correctAnswer?.trim() ?? null,
      };
    case 'short_answer':
      return {
        questionType: record.questionType,
        questionText,
        modelAnswer: record.modelAnswer.trim(),
      };
  }
}

function checkOptions(options: QuestionOption[]): string | null {
  if (options.length < 2) {
    return `needs at least 2 options, found ${options.length}`;
  }
  const letters = options.map((option) => option.letter);
  if (new Set(letters).size !== letters.length) {
    return 'duplicate option letters';
  }
  const expected = optionLetters(letters.length);
  if (letters.some((letter, i) => letter !== expected[i])) {
    return `option letters are not contiguous from A: ${letters.join(', ')}`;
  }
  if (options.some((option) => option.text.length === 0)) {
    return 'empty option text';
  }
  return null;
}

/**
 * Why a (repaired) record is structurally unusable, or null when it is sound
 */
export function validateQuestion(record: QuestionRecord, options: CorrectorOptions = DEFAULT_CORRECTOR_OPTIONS): string | null {
  if (record.questionText.trim().length === 0) {
    return 'empty question text';
  }

  switch (record.questionType) {
    case 'multiple_choice': {
      const optionProblem = checkOptions(record.options);
      if (optionProblem) return optionProblem;
      if (!record.correctAnswer) return 'missing correct answer';
      const answer = record.correctAnswer;
      if (!record.options.some((option) => option.letter === answer)) {
        return `correct answer ${answer} is not an option letter`;
      }
      return null;
    }
    case 'multiple_selection': {
      const optionProblem = checkOptions(record.options);
      if (optionProblem) return optionProblem;
      if (record.correctAnswers.length === 0) return 'missing correct answers';
      const letters = new Set(record.options.map((option) => option.letter));
      const unknown = record.correctAnswers.filter((answer) => !letters.has(answer));
      if (unknown.length > 0) {
        return `correct answers ${unknown.join(', ')} are not option letters`;
      }
      return null;
    }
    case 'true_false':
      if (record.correctAnswer === null || !TRUE_FALSE_ANSWERS.has(record.correctAnswer)) {
        return 'correct answer must be True or False';
      }
      return null;
    case 'short_answer':
      if (record.modelAnswer.trim().length < options.minModelAnswerLength) {
        return `model answer shorter than ${options.minModelAnswerLength} characters`;
      }
      return null;
  }
}

/**
 * Repair, validate and deduplicate records, keeping the reasons for rejects
 */
export function correctQuestions(
  records: readonly QuestionRecord[],
  options: Partial<CorrectorOptions> = {},
): CorrectionResult {
  const settings: CorrectorOptions = { ...DEFAULT_CORRECTOR_OPTIONS, ...options };
  const seen = new Set<string>(settings.seenQuestionTexts ?? []);
  const accepted: QuestionRecord[] = [];
  const rejected: RejectedQuestion[] = [];

  for (const record of records) {
    const repaired = repairQuestion(record);
    const problem = validateQuestion(repaired, settings);
    if (problem) {
      rejected.push({ record, reason: problem });
      continue;
    }
    if (seen.has(repaired.questionText)) {
      rejected.push({ record, reason: 'duplicate question text' });
      continue;
    }
    seen.add(repaired.questionText);
    accepted.push(repaired);
  }

  return { accepted, rejected };
}

/**
 * Keep only structurally sound, non-duplicate records, in input order
 */
export function filterQuestions(
  records: readonly QuestionRecord[],
  options: Partial<CorrectorOptions> = {},
): QuestionRecord[] {
  return correctQuestions(records, options).accepted;
}
