/**
 * Heuristic quality scoring for a finished question set, and a
 * lexical check of a question against its source content.
 */

import { validateQuestion } from '@/domain/question/corrector';
import type { QuestionRecord, QuestionType } from '@/domain/question/types';

// ============ Question Set Analysis ============

export interface OptionQuality {
	averageLength: number;
	/** Population variance of option text lengths */
	lengthVariance: number;
}

export interface QualityBreakdown {
	questionLength: number;
	optionQuality: number;
	diversity: number;
	structure: number;
}

export interface QualityAnalysis {
	/** 0-100 */
	overallQuality: number;
	breakdown: QualityBreakdown;
	typeDistribution: Partial<Record<QuestionType, number>>;
	averageQuestionLength: number;
	/** null when no question has options */
	optionQuality: OptionQuality | null;
	suggestions: string[];
}

const MAX_COMPONENT_SCORE = 25;
const TYPE_COUNT = 4;

function mean(values: number[]): number {
	return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

function variance(values: number[]): number {
	const m = mean(values);
	return mean(values.map((value) => (value - m) ** 2));
}

function scoreQuestionLength(averageLength: number): number {
	if (averageLength < 20) return (averageLength / 20) * 25;
	if (averageLength > 200) return Math.max(0, 25 - ((averageLength - 200) / 100) * 10);
	return 25;
}

function scoreOptions(quality: OptionQuality | null): number {
	if (!quality) return 15;

	const { averageLength, lengthVariance } = quality;
	let lengthScore = 15;
	if (averageLength < 5) lengthScore = (averageLength / 5) * 15;
	else if (averageLength > 100) lengthScore = Math.max(0, 15 - ((averageLength - 100) / 50) * 5);

	let varianceScore = 10;
	if (lengthVariance < 5) varianceScore = (lengthVariance / 5) * 10;
	else if (lengthVariance > 500) varianceScore = Math.max(0, 10 - ((lengthVariance - 500) / 500) * 5);

	return lengthScore + varianceScore;
}

/**
 * Score a question set from 0 to 100
 *
 * Four components of up to 25 points each: question length, option length
 * and spread, question type diversity, and structural validity.
 */
export function analyzeQuestionQuality(questions: readonly QuestionRecord[]): QualityAnalysis {
	if (questions.length === 0) {
		return {
			overallQuality: 0,
			breakdown: { questionLength: 0, optionQuality: 0, diversity: 0, structure: 0 },
			typeDistribution: {},
			averageQuestionLength: 0,
			optionQuality: null,
			suggestions: ['No questions to analyze'],
		};
	}

	const typeDistribution: Partial<Record<QuestionType, number>> = {};
	for (const question of questions) {
		typeDistribution[question.questionType] = (typeDistribution[question.questionType] ?? 0) + 1;
	}

	const averageQuestionLength = mean(questions.map((question) => question.questionText.length));

	const optionLengths = questions.flatMap((question) =>
		question.questionType === 'multiple_choice' || question.questionType === 'multiple_selection'
			? question.options.map((option) => option.text.length)
			: [],
	);
	const optionQuality: OptionQuality | null =
		optionLengths.length > 0
			? { averageLength: mean(optionLengths), lengthVariance: variance(optionLengths) }
			: null;

	const typeCount = Object.keys(typeDistribution).length;
	const validCount = questions.filter((question) => validateQuestion(question) === null).length;

	const breakdown: QualityBreakdown = {
		questionLength: scoreQuestionLength(averageQuestionLength),
		optionQuality: scoreOptions(optionQuality),
		diversity: Math.min(MAX_COMPONENT_SCORE, typeCount * (MAX_COMPONENT_SCORE / TYPE_COUNT)),
		structure: (validCount / questions.length) * MAX_COMPONENT_SCORE,
	};

	const suggestions: string[] = [];
	if (averageQuestionLength < 20) {
		suggestions.push('Questions are too short. Ask for more detailed questions.');
	} else if (averageQuestionLength > 200) {
		suggestions.push('Questions are too long. Ask for more concise questions.');
	}
	if (optionQuality) {
		if (optionQuality.averageLength < 5) {
			suggestions.push('Options are too short. Ask for more detailed options.');
		} else if (optionQuality.averageLength > 100) {
			suggestions.push('Options are too long. Ask for more concise options.');
		}
		if (optionQuality.lengthVariance < 5) {
			suggestions.push('Option lengths are too uniform. Vary their detail.');
		} else if (optionQuality.lengthVariance > 500) {
			suggestions.push('Option lengths vary too much. Keep them comparable.');
		}
	}
	if (typeCount < 2) {
		suggestions.push('Only one question type present. Mix in other types.');
	}
	if (validCount < questions.length) {
		suggestions.push(`${questions.length - validCount} questions have structural problems.`);
	}

	return {
		overallQuality: Math.round(
			breakdown.questionLength + breakdown.optionQuality + breakdown.diversity + breakdown.structure,
		),
		breakdown,
		typeDistribution,
		averageQuestionLength,
		optionQuality,
		suggestions,
	};
}

// ============ Content Verification ============

export interface ContentMatch {
	word: string;
	/** Up to 50 characters either side of the first occurrence */
	context: string;
}

export interface ContentVerification {
	verified: boolean;
	/** Share of important words found in the content */
	confidence: number;
	matches: ContentMatch[];
}

const VERIFICATION_THRESHOLD = 0.7;
const CONTEXT_RADIUS = 50;
const ALPHABETIC = /^\p{L}+$/u;

/**
 * Words of a question worth checking: alphabetic, longer than 4 characters
 */
export function importantWords(questionText: string): string[] {
	return questionText
		.toLowerCase()
		.split(/\s+/)
		.filter((word) => word.length > 4 && ALPHABETIC.test(word));
}

/**
 * Check how much of a question's vocabulary appears in its source content
 */
export function verifyAgainstContent(question: QuestionRecord, content: string): ContentVerification {
	const words = importantWords(question.questionText);
	if (words.length === 0) {
		return { verified: false, confidence: 0, matches: [] };
	}

	const lowered = content.toLowerCase();
	const matches: ContentMatch[] = [];
	for (const word of words) {
		const at = lowered.indexOf(word);
		if (at === -1) continue;
		const start = Math.max(0, at - CONTEXT_RADIUS);
		const end = Math.min(content.length, at + word.length + CONTEXT_RADIUS);
		matches.push({ word, context: content.slice(start, end) });
	}

	const confidence = matches.length / words.length;
	return { verified: confidence > VERIFICATION_THRESHOLD, confidence, matches };
}
