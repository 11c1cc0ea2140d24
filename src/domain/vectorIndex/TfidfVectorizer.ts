import { NotFittedError } from '@/domain/errors';
import { ENGLISH_STOP_WORDS, countTerms, extractTerms } from './tokenize';
import type { SparseVector, VectorizerOptions, VectorizerState } from './types';
import { DEFAULT_VECTORIZER_OPTIONS } from './types';

const NO_STOP_WORDS: ReadonlySet<string> = new Set();

function compareStrings(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

/**
 * TF-IDF vectorizer with a frozen vocabulary
 *
 * - Term frequency is the raw count of a term in the text
 * - IDF is smoothed: ln((1 + n) / (1 + df)) + 1
 * - Only the `maxFeatures` most frequent corpus terms are kept
 *   (ties broken alphabetically); feature indices follow alphabetical order
 * - Output vectors are L2-normalized so cosine similarity is a dot product
 */
export class TfidfVectorizer {
	private readonly options: VectorizerOptions;
	private terms: string[] = [];
	private idf: number[] = [];
	private termIndex: Map<string, number> = new Map();
	private fitted = false;

	constructor(options: Partial<VectorizerOptions> = {}) {
		this.options = { ...DEFAULT_VECTORIZER_OPTIONS, ...options };
	}

	/**
	 * Rebuild a fitted vectorizer from persisted state
	 */
	static fromState(state: VectorizerState): TfidfVectorizer {
		const vectorizer = new TfidfVectorizer(state.options);
		vectorizer.setVocabulary([...state.terms], [...state.idf]);
		return vectorizer;
	}

	get isFitted(): boolean {
		return this.fitted;
	}

	/**
	 * Number of features in the frozen vocabulary
	 */
	getDimensions(): number {
		return this.terms.length;
	}

	getOptions(): VectorizerOptions {
		return { ...this.options, ngramRange: [...this.options.ngramRange] };
	}

	/**
	 * Learn vocabulary and IDF weights from a corpus, replacing any previous state
	 */
	fit(documents: readonly string[]): void {
		const totalCounts = new Map<string, number>();
		const documentFrequency = new Map<string, number>();

		for (const document of documents) {
			const counts = countTerms(this.extractTerms(document));
			for (const [term, count] of counts) {
				totalCounts.set(term, (totalCounts.get(term) ?? 0) + count);
				documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
			}
		}

		const kept = Array.from(totalCounts.entries())
			.sort((a, b) => b[1] - a[1] || compareStrings(a[0], b[0]))
			.slice(0, this.options.maxFeatures)
			.map(([term]) => term)
			.sort(compareStrings);

		const n = documents.length;
		const idf = kept.map((term) => {
			if (!this.options.useIdf) return 1;
			const df = documentFrequency.get(term) ?? 0;
			return Math.log((1 + n) / (1 + df)) + 1;
		});

		this.setVocabulary(kept, idf);
	}

	/**
	 * Project text into the frozen feature space
	 */
	vectorize(text: string): SparseVector {
		if (!this.fitted) {
			throw new NotFittedError('Vectorizer is not fitted yet. Call fit() first.');
		}

		const weights = new Map<number, number>();
		for (const [term, count] of countTerms(this.extractTerms(text))) {
			const index = this.termIndex.get(term);
			if (index !== undefined) {
				weights.set(index, count * this.idf[index]);
			}
		}

		const indices = Array.from(weights.keys()).sort((a, b) => a - b);
		const values = indices.map((index) => weights.get(index) ?? 0);

		let norm = 0;
		for (const value of values) {
			norm += value * value;
		}
		norm = Math.sqrt(norm);

		return {
			indices,
			values: norm > 0 ? values.map((value) => value / norm) : values,
		};
	}

	/**
	 * Expand a sparse vector into a dense array over the vocabulary
	 */
	toDense(vector: SparseVector): number[] {
		const dense = new Array<number>(this.terms.length).fill(0);
		vector.indices.forEach((index, i) => {
			dense[index] = vector.values[i];
		});
		return dense;
	}

	/**
	 * Snapshot of the fitted vocabulary
	 */
	toState(): VectorizerState {
		if (!this.fitted) {
			throw new NotFittedError('Vectorizer is not fitted yet. Call fit() first.');
		}
		return {
			terms: [...this.terms],
			idf: [...this.idf],
			options: this.getOptions(),
		};
	}

	private extractTerms(text: string): string[] {
		return extractTerms(
			text,
			this.options.ngramRange,
			this.options.removeStopWords ? ENGLISH_STOP_WORDS : NO_STOP_WORDS,
		);
	}

	private setVocabulary(terms: string[], idf: number[]): void {
		this.terms = terms;
		this.idf = idf;
		this.termIndex = new Map(terms.map((term, index) => [term, index]));
		this.fitted = true;
	}
}
