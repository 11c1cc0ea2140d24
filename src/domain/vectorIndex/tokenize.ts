/**
 * Text tokenization for TF-IDF vectorization
 *
 * Tokens are lowercased runs of two or more word characters.
 * N-grams are built from adjacent tokens after stop word removal.
 */

import stopWordList from './stopWords.json';

const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/**
 * English stop words dropped before n-gram construction
 */
export const ENGLISH_STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Split text into lowercase word tokens
 *
 * @param text - Raw text
 * @returns Tokens in document order
 */
export function tokenize(text: string): string[] {
	return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Build n-gram terms from text
 *
 * @param text - Raw text
 * @param ngramRange - Inclusive [min, max] n-gram lengths
 * @param stopWords - Tokens to drop before joining n-grams
 * @returns Terms in document order (repeats kept for counting)
 */
export function extractTerms(
	text: string,
	ngramRange: [number, number],
	stopWords: ReadonlySet<string> = ENGLISH_STOP_WORDS,
): string[] {
	const tokens = tokenize(text).filter((token) => !stopWords.has(token));
	const [minN, maxN] = ngramRange;
	const terms: string[] = [];

	for (let n = minN; n <= maxN; n++) {
		for (let i = 0; i + n <= tokens.length; i++) {
			terms.push(n === 1 ? tokens[i] : tokens.slice(i, i + n).join(' '));
		}
	}

	return terms;
}

/**
 * Count term occurrences
 */
export function countTerms(terms: string[]): Map<string, number> {
	const counts = new Map<string, number>();
	for (const term of terms) {
		counts.set(term, (counts.get(term) ?? 0) + 1);
	}
	return counts;
}
