/**
 * Tolerant reader for model output in the prompt's "Q<n>." format.
 *
 * Never throws: anything it cannot read is either left out of a record
 * (and later rejected by the corrector) or reported in `skipped`.
 */

import type {
  ParseResult,
  QuestionOption,
  QuestionRecord,
  QuestionType,
  SkippedSegment,
} from './types';

// ============ Line Patterns ============

const QUESTION_MARKER =
  /^\s*(?:#{1,6}\s*)?(?:\*\*)?\s*Q(?:uestion)?\s*\d+\s*(?:\*\*)?\s*[.:)]\s*(?:\*\*)?\s*(.*)$/i;

const OPTION_LINE = /^\s*(?:[-*]\s+)?(?:\*\*)?\(?([A-Ja-j])[.):](?:\*\*)?\s+(.+)$/;

const ANSWER_LINE = /\b(?:correct\s+)?answers?\s*(?:\*\*)?\s*[:：]\s*(?:\*\*)?(.*)$/i;

const MODEL_ANSWER_LINE = /\b(?:model|sample|expected)\s+answer\s*(?:\*\*)?\s*[:：]\s*(?:\*\*)?(.*)$/i;

const UPPERCASE_LETTER = /\b([A-J])\b/g;
const LETTER_LIST_ONLY = /^[\s\][(),;&/.A-Ja-j]*$/;
const LEADING_TRUE_FALSE = /^(true|false)\b/i;
const LEADING_LETTER = /^\(?([A-Ja-j])[.)](?:\s|$)/;

function cleanText(text: string): string {
  let cleaned = text.replace(/\*\*/g, '').trim();
  if (cleaned.startsWith('[') && cleaned.endsWith(']')) {
    cleaned = cleaned.slice(1, -1).trim();
  }
  return cleaned;
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

// ============ Segmentation ============

/**
 * Split raw output into per-question line groups.
 * Text before the first marker is commentary and dropped.
 */
interface Segment {
  marker: string;
  header: string;
  lines: string[];
}

function splitSegments(raw: string): Segment[] {
  const segments: Segment[] = [];
  let current: Segment | null = null;

  for (const line of raw.split(/\r?\n/)) {
    const marker = QUESTION_MARKER.exec(line);
    if (marker) {
      current = { marker: line, header: marker[1] ?? '', lines: [] };
      segments.push(current);
    } else if (current) {
      current.lines.push(line);
    }
  }

  return segments;
}

// ============ Answer Extraction ============

/**
 * The one option letter an answer names. A value naming several letters,
 * or none, is kept as written so the corrector rejects it.
 */
function extractSingleLetter(value: string, optionLetters: string[]): string | null {
  const cleaned = cleanText(value);
  if (cleaned.length === 0) return null;

  const leading = LEADING_LETTER.exec(cleaned);
  if (leading) return leading[1].toUpperCase();

  let letters = extractLetters(cleaned);
  if (!LETTER_LIST_ONLY.test(cleaned) && optionLetters.length > 0) {
    letters = letters.filter((letter) => optionLetters.includes(letter));
  }
  const distinct = new Set(letters);
  return distinct.size === 1 ? letters[0] : cleaned;
}

function extractLetters(value: string): string[] {
  const source = LETTER_LIST_ONLY.test(value) ? value.toUpperCase() : value;
  return Array.from(source.matchAll(UPPERCASE_LETTER), (match) => match[1]);
}

/**
 * "True" or "False" when the answer leads with one; anything else
 * (a negation, a hedge) is kept as written
 */
function extractTrueFalse(value: string): string | null {
  const cleaned = cleanText(value);
  const match = LEADING_TRUE_FALSE.exec(cleaned);
  if (match) {
    return match[1].toLowerCase() === 'true' ? 'True' : 'False';
  }
  return cleaned.length > 0 ? cleaned : null;
}

/**
 * Value of the first answer line, or of the next non-blank line
 * when the marker stands alone
 */
function readAnswerValue(lines: string[], index: number, match: RegExpExecArray): string {
  const inline = cleanText(match[1] ?? '');
  if (inline.length > 0) return inline;
  const next = lines.slice(index + 1).find((line) => !isBlank(line));
  return next ? cleanText(next) : '';
}

// ============ Segment Readers ============

interface SegmentParts {
  questionText: string;
  options: QuestionOption[];
  answer: string | null;
}

function readOptionSegment(header: string, lines: string[]): SegmentParts {
  const textParts = [header];
  const options: QuestionOption[] = [];
  let answer: string | null = null;
  let inQuestion = true;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (isBlank(line)) continue;

    const answerMatch = ANSWER_LINE.exec(line);
    if (answerMatch && !OPTION_LINE.test(line)) {
      answer = readAnswerValue(lines, i, answerMatch);
      break;
    }

    const option = OPTION_LINE.exec(line);
    if (option) {
      inQuestion = false;
      options.push({ letter: option[1].toUpperCase(), text: cleanText(option[2]) });
    } else if (inQuestion) {
      textParts.push(line);
    } else if (options.length > 0) {
      // wrapped option text
      const last = options[options.length - 1];
      last.text = `${last.text} ${cleanText(line)}`.trim();
    }
  }

  return { questionText: joinText(textParts), options, answer };
}

function readTrueFalseSegment(header: string, lines: string[]): SegmentParts {
  const textParts = [header];
  let answer: string | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (isBlank(line)) continue;
    const answerMatch = ANSWER_LINE.exec(line);
    if (answerMatch) {
      answer = readAnswerValue(lines, i, answerMatch);
      break;
    }
    textParts.push(line);
  }

  return { questionText: joinText(textParts), options: [], answer };
}

function readShortAnswerSegment(header: string, lines: string[]): SegmentParts {
  const textParts = [header];
  const answerParts: string[] = [];
  let answerFound = false;

  for (const line of lines) {
    if (answerFound) {
      if (isBlank(line)) break;
      answerParts.push(line);
      continue;
    }
    if (isBlank(line)) continue;

    const answerMatch = MODEL_ANSWER_LINE.exec(line) ?? ANSWER_LINE.exec(line);
    if (answerMatch) {
      answerFound = true;
      answerParts.push(answerMatch[1] ?? '');
    } else {
      textParts.push(line);
    }
  }

  return {
    questionText: joinText(textParts),
    options: [],
    answer: answerFound ? joinText(answerParts) : null,
  };
}

function joinText(parts: string[]): string {
  return parts
    .map(cleanText)
    .filter((part) => part.length > 0)
    .join(' ');
}

function toRecord(questionType: QuestionType, parts: SegmentParts): QuestionRecord {
  switch (questionType) {
    case 'multiple_choice':
      return {
        questionType,
        questionText: parts.questionText,
        options: parts.options,
        correctAnswer:
          parts.answer === null
            ? null
            : extractSingleLetter(
                parts.answer,
                parts.options.map((option) => option.letter),
              ),
      };
    case 'multiple_selection':
      return {
        questionType,
        questionText: parts.questionText,
        options: parts.options,
        correctAnswers: parts.answer === null ? [] : extractLetters(parts.answer),
      };
    case 'true_false':
      return {
        questionType,
        questionText: parts.questionText,
        correctAnswer: parts.answer === null ? null : extractTrueFalse(parts.answer),
      };
    case 'short_answer':
      return {
        questionType,
        questionText: parts.questionText,
        modelAnswer: parts.answer ?? '',
      };
  }
}

// ============ Public API ============

/**
 * Parse raw model output into question records of one type
 *
 * @param raw - Model output text
 * @param questionType - Type every record is read as
 */
export function parseQuestionResponse(raw: string, questionType: QuestionType): ParseResult {
  const segments = splitSegments(raw);
  const questions: QuestionRecord[] = [];
  const skipped: SkippedSegment[] = [];

  if (segments.length === 0) {
    if (raw.trim().length > 0) {
      skipped.push({ segment: raw.trim(), reason: 'no question markers found' });
    }
    return { questions, skipped };
  }

  for (const { marker, header, lines } of segments) {
    const parts =
      questionType === 'true_false'
        ? readTrueFalseSegment(header, lines)
        : questionType === 'short_answer'
          ? readShortAnswerSegment(header, lines)
          : readOptionSegment(header, lines);

    if (parts.questionText.length === 0) {
      skipped.push({
        segment: [marker, ...lines].join('\n').trim(),
        reason: 'missing question text',
      });
      continue;
    }

    questions.push(toRecord(questionType, parts));
  }

  return { questions, skipped };
}

/**
 * Parse raw model output, keeping only the records
 */
export function parseQuestions(raw: string, questionType: QuestionType): QuestionRecord[] {
  return parseQuestionResponse(raw, questionType).questions;
}
