import type { IStorageAdapter } from '@/ports/IStorageAdapter';
import type { VectorizerOptions } from './types';
import { VectorIndex } from './VectorIndex';

/**
 * Fitted vector indexes keyed by document identity
 *
 * Re-fitting a document builds a fresh index and swaps the handle; an index
 * already handed out is never mutated, so in-flight searches keep a consistent
 * vocabulary.
 */
export class IndexRegistry {
	private indexes: Map<string, VectorIndex> = new Map();
	private readonly options: Partial<VectorizerOptions>;

	constructor(options: Partial<VectorizerOptions> = {}) {
		this.options = options;
	}

	/**
	 * Fit a new index for a document, replacing any previous one
	 */
	fit(documentId: string, chunks: readonly string[]): VectorIndex {
		const index = new VectorIndex(this.options);
		index.fit(chunks);
		this.indexes.set(documentId, index);
		return index;
	}

	/**
	 * Restore a persisted index for a document and register it
	 */
	async load(documentId: string, storage: IStorageAdapter, location: string): Promise<VectorIndex> {
		const index = await VectorIndex.restore(storage, location);
		this.indexes.set(documentId, index);
		return index;
	}

	get(documentId: string): VectorIndex | null {
		return this.indexes.get(documentId) ?? null;
	}

	has(documentId: string): boolean {
		return this.indexes.has(documentId);
	}

	/**
	 * Drop the handle for a document
	 * @returns true if an index was registered
	 */
	invalidate(documentId: string): boolean {
		return this.indexes.delete(documentId);
	}

	/**
	 * Registered document identities
	 */
	documentIds(): string[] {
		return Array.from(this.indexes.keys());
	}
}
