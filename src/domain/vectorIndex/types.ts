/**
 * Sparse, L2-normalized term vector.
 * `indices` are ascending positions in the vocabulary; `values` are parallel weights.
 */
export interface SparseVector {
	indices: number[];
	values: number[];
}

/**
 * Configuration for TF-IDF vectorization
 */
export interface VectorizerOptions {
	/** Maximum vocabulary size (vector dimensionality cap) */
	maxFeatures: number;
	/** Smallest and largest n-gram length */
	ngramRange: [number, number];
	/** Whether to weight terms by inverse document frequency */
	useIdf: boolean;
	/** Whether to drop English stop words before forming n-grams */
	removeStopWords: boolean;
}

/**
 * Default vectorizer configuration: unigrams + bigrams, 5000 features
 */
export const DEFAULT_VECTORIZER_OPTIONS: VectorizerOptions = {
	maxFeatures: 5000,
	ngramRange: [1, 2],
	useIdf: true,
	removeStopWords: true,
};

/**
 * Frozen vectorizer state (vocabulary and weights)
 */
export interface VectorizerState {
	/** Vocabulary terms, sorted; position is the feature index */
	terms: string[];
	/** Inverse document frequency per term */
	idf: number[];
	options: VectorizerOptions;
}

/**
 * A single search hit
 */
export interface RetrievalHit {
	/** The chunk text */
	chunk: string;
	/** Position of the chunk in the fitted sequence */
	position: number;
	/** Cosine similarity between query and chunk */
	score: number;
}

/**
 * Search hits ordered by descending score
 */
export type RetrievalResult = RetrievalHit[];

/** Current schema version for persisted index artifacts */
export const VECTOR_INDEX_VERSION = 1;

/**
 * Persisted vocabulary artifact
 */
export interface PersistedVocabulary extends VectorizerState {
	version: number;
}

/**
 * Persisted chunk sequence artifact
 */
export interface PersistedChunks {
	version: number;
	chunks: string[];
}

/**
 * Persisted lookup structure artifact
 */
export interface PersistedIndexStructure {
	version: number;
	dimension: number;
	vectors: SparseVector[];
}
