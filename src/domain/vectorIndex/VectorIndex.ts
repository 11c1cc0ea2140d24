import { CorruptStateError, EmptyCorpusError, NotFittedError } from '@/domain/errors';
import type { IStorageAdapter } from '@/ports/IStorageAdapter';
import { z } from 'zod';
import { TfidfVectorizer } from './TfidfVectorizer';
import type {
	PersistedChunks,
	PersistedIndexStructure,
	PersistedVocabulary,
	RetrievalResult,
	SparseVector,
	VectorizerOptions,
} from './types';
import { VECTOR_INDEX_VERSION } from './types';

// ============ Persisted Artifact Schemas ============

const sparseVectorSchema = z.object({
	indices: z.array(z.number().int().nonnegative()),
	values: z.array(z.number()),
});

const vocabularySchema = z.object({
	version: z.literal(VECTOR_INDEX_VERSION),
	terms: z.array(z.string()),
	idf: z.array(z.number()),
	options: z.object({
		maxFeatures: z.number().int().positive(),
		ngramRange: z.tuple([z.number().int().positive(), z.number().int().positive()]),
		useIdf: z.boolean(),
		removeStopWords: z.boolean(),
	}),
});

const chunksSchema = z.object({
	version: z.literal(VECTOR_INDEX_VERSION),
	chunks: z.array(z.string()),
});

const indexStructureSchema = z.object({
	version: z.literal(VECTOR_INDEX_VERSION),
	dimension: z.number().int().nonnegative(),
	vectors: z.array(sparseVectorSchema),
});

/**
 * Storage keys of the three artifacts that make up a persisted index
 */
export function getIndexArtifactKeys(location: string): {
	vocabulary: string;
	chunks: string;
	index: string;
} {
	const prefix = location.replace(/\/+$/, '');
	return {
		vocabulary: `${prefix}/vocabulary`,
		chunks: `${prefix}/chunks`,
		index: `${prefix}/index`,
	};
}

/**
 * TF-IDF vector index over an ordered sequence of text chunks
 *
 * Lookup is an exhaustive inner-product scan over L2-normalized sparse vectors,
 * so scores are cosine similarities. Once fit, the vocabulary is frozen;
 * `search` and `transform` never mutate state and may be shared across
 * concurrent requests.
 */
export class VectorIndex {
	private readonly vectorizerOptions: Partial<VectorizerOptions>;
	private vectorizer: TfidfVectorizer | null = null;
	private chunks: string[] = [];
	private vectors: SparseVector[] = [];

	constructor(options: Partial<VectorizerOptions> = {}) {
		this.vectorizerOptions = options;
	}

	get isFitted(): boolean {
		return this.vectorizer !== null;
	}

	/**
	 * Number of indexed chunks (0 when unfit)
	 */
	get size(): number {
		return this.chunks.length;
	}

	/**
	 * Vector dimensionality (0 when unfit)
	 */
	getDimensions(): number {
		return this.vectorizer?.getDimensions() ?? 0;
	}

	/**
	 * Indexed chunks in their original order
	 */
	getChunks(): readonly string[] {
		return this.chunks;
	}

	/**
	 * Build vocabulary, vectors and lookup structure from a corpus.
	 * Any previous state is discarded.
	 *
	 * @throws EmptyCorpusError if `chunks` is empty
	 */
	fit(chunks: readonly string[]): void {
		if (chunks.length === 0) {
			throw new EmptyCorpusError();
		}

		const vectorizer = new TfidfVectorizer(this.vectorizerOptions);
		vectorizer.fit(chunks);

		this.chunks = [...chunks];
		this.vectors = this.chunks.map((chunk) => vectorizer.vectorize(chunk));
		this.vectorizer = vectorizer;
	}

	/**
	 * Project texts into the frozen feature space
	 *
	 * @returns One dense, L2-normalized row per text
	 * @throws NotFittedError if called before `fit`
	 */
	transform(texts: readonly string[]): number[][] {
		const vectorizer = this.requireVectorizer();
		return texts.map((text) => vectorizer.toDense(vectorizer.vectorize(text)));
	}

	/**
	 * Find the chunks most similar to a query
	 *
	 * @param query - Free-text query
	 * @param k - Maximum number of hits
	 * @returns Top `min(k, size)` hits by descending score, ties by chunk position
	 * @throws NotFittedError if called before `fit`
	 */
	search(query: string, k: number): RetrievalResult {
		if (!Number.isInteger(k) || k < 1) {
			throw new RangeError(`k must be a positive integer, got ${k}`);
		}

		const vectorizer = this.requireVectorizer();
		const queryVector = vectorizer.vectorize(query);
		const queryWeights = new Map<number, number>();
		queryVector.indices.forEach((index, i) => {
			queryWeights.set(index, queryVector.values[i]);
		});

		const scored = this.vectors.map((vector, position) => {
			let score = 0;
			vector.indices.forEach((index, i) => {
				const weight = queryWeights.get(index);
				if (weight !== undefined) {
					score += weight * vector.values[i];
				}
			});
			return { position, score };
		});

		scored.sort((a, b) => b.score - a.score || a.position - b.position);

		return scored.slice(0, Math.min(k, this.chunks.length)).map(({ position, score }) => ({
			chunk: this.chunks[position],
			position,
			score,
		}));
	}

	/**
	 * Write vocabulary, chunks and vectors under `location`
	 *
	 * @throws NotFittedError if the index is unfit
	 */
	async persist(storage: IStorageAdapter, location: string): Promise<void> {
		const vectorizer = this.requireVectorizer();
		const keys = getIndexArtifactKeys(location);

		const vocabulary: PersistedVocabulary = {
			version: VECTOR_INDEX_VERSION,
			...vectorizer.toState(),
		};
		const chunks: PersistedChunks = {
			version: VECTOR_INDEX_VERSION,
			chunks: [...this.chunks],
		};
		const structure: PersistedIndexStructure = {
			version: VECTOR_INDEX_VERSION,
			dimension: vectorizer.getDimensions(),
			vectors: this.vectors.map((vector) => ({
				indices: [...vector.indices],
				values: [...vector.values],
			})),
		};

		await storage.write(keys.vocabulary, vocabulary);
		await storage.write(keys.chunks, chunks);
		await storage.write(keys.index, structure);
	}

	/**
	 * Load a previously persisted index
	 *
	 * @throws CorruptStateError if any artifact is missing, malformed or inconsistent
	 */
	static async restore(storage: IStorageAdapter, location: string): Promise<VectorIndex> {
		const keys = getIndexArtifactKeys(location);
		const [rawVocabulary, rawChunks, rawStructure] = await Promise.all([
			storage.read<unknown>(keys.vocabulary),
			storage.read<unknown>(keys.chunks),
			storage.read<unknown>(keys.index),
		]);

		const missing = Object.entries({
			vocabulary: rawVocabulary,
			chunks: rawChunks,
			index: rawStructure,
		})
			.filter(([, value]) => value === null)
			.map(([name]) => name);
		if (missing.length > 0) {
			throw new CorruptStateError(
				`Index at "${location}" is missing artifacts: ${missing.join(', ')}`,
			);
		}

		const vocabulary = vocabularySchema.safeParse(rawVocabulary);
		const chunks = chunksSchema.safeParse(rawChunks);
		const structure = indexStructureSchema.safeParse(rawStructure);

		if (!vocabulary.success) {
			throw new CorruptStateError(`Malformed vocabulary at "${location}"`, vocabulary.error);
		}
		if (!chunks.success) {
			throw new CorruptStateError(`Malformed chunk sequence at "${location}"`, chunks.error);
		}
		if (!structure.success) {
			throw new CorruptStateError(`Malformed index structure at "${location}"`, structure.error);
		}

		const { terms, idf, options } = vocabulary.data;
		const dimension = structure.data.dimension;

		if (terms.length !== idf.length || terms.length !== dimension) {
			throw new CorruptStateError(
				`Vocabulary size ${terms.length} does not match index dimension ${dimension}`,
			);
		}
		if (structure.data.vectors.length !== chunks.data.chunks.length) {
			throw new CorruptStateError(
				`Index holds ${structure.data.vectors.length} vectors for ${chunks.data.chunks.length} chunks`,
			);
		}
		if (chunks.data.chunks.length === 0) {
			throw new CorruptStateError(`Index at "${location}" holds no chunks`);
		}
		for (const vector of structure.data.vectors) {
			if (
				vector.indices.length !== vector.values.length ||
				vector.indices.some((index) => index >= dimension)
			) {
				throw new CorruptStateError(`Index at "${location}" holds an out-of-range vector`);
			}
		}

		const index = new VectorIndex(options);
		index.vectorizer = TfidfVectorizer.fromState({ terms, idf, options });
		index.chunks = [...chunks.data.chunks];
		index.vectors = structure.data.vectors.map((vector) => ({
			indices: [...vector.indices],
			values: [...vector.values],
		}));
		return index;
	}

	private requireVectorizer(): TfidfVectorizer {
		if (!this.vectorizer) {
			throw new NotFittedError();
		}
		return this.vectorizer;
	}
}
