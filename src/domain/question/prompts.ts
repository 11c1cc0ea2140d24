/**
 * Question Generation Prompts Module
 *
 * Builds the single prompt sent to the model for one batch, and owns the
 * output format constants the response parser reads back.
 */

import type { Difficulty, GenerationConfig, QuestionType } from './types';

// ============ Format Constants ============

/** Labels used in prompt text, e.g. "Generate 5 multiple-choice questions" */
export const QUESTION_TYPE_LABELS: Record<QuestionType, string> = {
  multiple_choice: 'multiple-choice',
  multiple_selection: 'multiple-selection',
  true_false: 'true/false',
  short_answer: 'short answer',
};

/** Answer line markers, written as `<marker>: <value>` */
export const ANSWER_MARKERS = {
  single: 'Correct Answer',
  multiple: 'Correct Answers',
  model: 'Model Answer',
} as const;

export const SELECT_ALL_SUFFIX = '(Select all that apply)';

/** Options requested per question; types without options are absent */
export const OPTION_COUNTS: Partial<Record<QuestionType, number>> = {
  multiple_choice: 4,
  multiple_selection: 5,
};

export const NO_CONTEXT_NOTICE = '(No matching document content was found. Write general questions on the topic.)';

/**
 * Letters for the first `count` options: A, B, C, ...
 */
export function optionLetters(count: number): string[] {
  return Array.from({ length: count }, (_, i) => String.fromCharCode(65 + i));
}

// ============ Type-Specific Guidance ============

const TYPE_REQUIREMENTS: Record<QuestionType, string[]> = {
  multiple_choice: [
    'Have exactly 4 options (A, B, C, D)',
    'Have exactly one correct answer',
    'Use wrong options that are plausible but clearly incorrect',
  ],
  multiple_selection: [
    'Have exactly 5 options (A, B, C, D, E)',
    'Have 2-3 correct answers',
    'Use wrong options that are plausible but clearly incorrect',
  ],
  true_false: ['Be a single statement that is clearly true or clearly false'],
  short_answer: ['Be answerable in 1-3 sentences'],
};

const DIFFICULTY_GUIDANCE: Record<Difficulty, Record<QuestionType, string[]>> = {
  low: {
    multiple_choice: [
      'Focus on basic recall and understanding',
      'Use straightforward language',
      'Make distractors clearly different from the correct answer',
    ],
    multiple_selection: [
      'Focus on basic recall and understanding',
      'Use straightforward language',
      'Make incorrect options clearly different from correct ones',
    ],
    true_false: [
      'Focus on facts stated directly in the text',
      'Use straightforward language',
      'Avoid ambiguity',
    ],
    short_answer: [
      'Ask for definitions or simple explanations',
      'Expect answers taken directly from the text',
    ],
  },
  medium: {
    multiple_choice: [
      'Test application and analysis',
      'Include some nuance',
      'Make distractors somewhat similar to the correct answer',
    ],
    multiple_selection: [
      'Test application and analysis',
      'Include some nuance',
      'Make incorrect options somewhat similar to correct ones',
    ],
    true_false: [
      'Test inference and interpretation',
      'Require understanding of relationships between concepts',
    ],
    short_answer: [
      'Ask for explanations of relationships or processes',
      'Require combining information from different parts of the text',
    ],
  },
  high: {
    multiple_choice: [
      'Test evaluation and synthesis',
      'Make distractors very similar to the correct answer',
    ],
    multiple_selection: [
      'Test evaluation and synthesis',
      'Make incorrect options very similar to correct ones',
    ],
    true_false: [
      'Use precise statements where small details matter',
      'Require deep understanding of the material',
    ],
    short_answer: [
      'Ask for justifications or assessments',
      'Require critical thinking beyond restating the text',
    ],
  },
};

// ============ Format Examples ============

/**
 * The exact output shape for one question of the given type
 */
export function formatExample(questionType: QuestionType): string {
  const optionCount = OPTION_COUNTS[questionType] ?? 0;
  const letters = optionLetters(optionCount);
  const options = letters.map((letter) => `${letter}. [Option ${letter}]`);

  switch (questionType) {
    case 'multiple_choice':
      return [
        'Q1. [Question text]',
        ...options,
        `${ANSWER_MARKERS.single}: [${letters.join('/')}]`,
      ].join('\n');
    case 'multiple_selection':
      return [
        `Q1. [Question text] ${SELECT_ALL_SUFFIX}`,
        ...options,
        `${ANSWER_MARKERS.multiple}: [All correct letters, e.g. A, C, E]`,
      ].join('\n');
    case 'true_false':
      return ['Q1. [Statement]', `${ANSWER_MARKERS.single}: [True/False]`].join('\n');
    case 'short_answer':
      return ['Q1. [Question text]', `${ANSWER_MARKERS.model}: [Brief expected answer]`].join('\n');
  }
}

// ============ Prompt Builder ============

/**
 * Build the prompt for one batch of questions
 *
 * @param config - Validated generation request
 * @param context - Retrieved document content (may be empty)
 * @param count - Questions to request in this batch; defaults to the full request
 */
export function buildGenerationPrompt(
  config: GenerationConfig,
  context: string,
  count: number = config.requestedCount,
): string {
  const { questionType, difficulty, language } = config;
  const noun = count === 1 ? 'question' : 'questions';

  const requirements = [
    'Be directly based on the provided content',
    ...TYPE_REQUIREMENTS[questionType],
    `Be at ${difficulty} difficulty level`,
    `Be written in ${language}`,
  ];

  const guidance = DIFFICULTY_GUIDANCE[difficulty][questionType].map((line) => `- ${line}`);

  return `Generate ${count} ${QUESTION_TYPE_LABELS[questionType]} ${noun} based on the content below.

You are an expert question writer. Each question must:
${requirements.map((line, i) => `${i + 1}. ${line}`).join('\n')}

Guidance for ${difficulty} difficulty:
${guidance.join('\n')}

Focus specifically on the topic: ${config.topic ?? 'general'}

Format each question exactly as follows, numbering them Q1, Q2, ... and leaving a blank line between questions:
${formatExample(questionType)}

Keep questions distinct from each other. Do not add commentary before or after the questions.

Content:
"""
${context.trim().length > 0 ? context : NO_CONTEXT_NOTICE}
"""`;
}
