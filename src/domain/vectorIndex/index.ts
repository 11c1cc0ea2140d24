// Types
export type {
	PersistedChunks,
	PersistedIndexStructure,
	PersistedVocabulary,
	RetrievalHit,
	RetrievalResult,
	SparseVector,
	VectorizerOptions,
	VectorizerState,
} from './types';
export { DEFAULT_VECTORIZER_OPTIONS, VECTOR_INDEX_VERSION } from './types';

// Tokenization
export { ENGLISH_STOP_WORDS, countTerms, extractTerms, tokenize } from './tokenize';

// Vectorizer
export { TfidfVectorizer } from './TfidfVectorizer';

// Index
export { VectorIndex, getIndexArtifactKeys } from './VectorIndex';
export { IndexRegistry } from './IndexRegistry';
