import { InMemoryStorageAdapter } from '@/adapters/mock/InMemoryStorageAdapter';
import { CorruptStateError, EmptyCorpusError, NotFittedError } from '@/domain/errors';
import { beforeEach, describe, expect, it } from 'vitest';
import { IndexRegistry } from '../IndexRegistry';
import { VectorIndex, getIndexArtifactKeys } from '../VectorIndex';

const CORPUS = [
	'Gravity pulls objects toward the earth.',
	'Plants use light to make sugar.',
	'The moon orbit is shaped by gravity and mass.',
	'Rain falls from clouds over the ocean.',
	'Tides are caused by the gravity of the moon.',
];

function fitted(chunks: readonly string[] = CORPUS): VectorIndex {
	const index = new VectorIndex();
	index.fit(chunks);
	return index;
}

describe('VectorIndex', () => {
	describe('fit', () => {
		it('should index every chunk', () => {
			const index = fitted();

			expect(index.isFitted).toBe(true);
			expect(index.size).toBe(5);
			expect(index.getChunks()).toEqual(CORPUS);
		});

		it('should reject an empty corpus', () => {
			expect(() => new VectorIndex().fit([])).toThrow(EmptyCorpusError);
		});

		it('should discard previous state when fit again', () => {
			const index = fitted();
			index.fit(['alpha beta']);

			expect(index.size).toBe(1);
			expect(index.search('gravity', 5)[0].score).toBe(0);
		});

		it('should cap dimensionality at maxFeatures', () => {
			const index = new VectorIndex({ maxFeatures: 3 });
			index.fit(CORPUS);

			expect(index.getDimensions()).toBe(3);
		});
	});

	describe('search', () => {
		it('should return the gravity chunks first, by descending score', () => {
			const hits = fitted().search('gravity', 3);

			expect(hits).toHaveLength(3);
			expect(hits.map((hit) => hit.position).sort()).toEqual([0, 2, 4]);
			for (let i = 1; i < hits.length; i++) {
				expect(hits[i - 1].score).toBeGreaterThanOrEqual(hits[i].score);
			}
			for (const hit of hits) {
				expect(hit.score).toBeGreaterThan(0);
				expect(hit.chunk).toBe(CORPUS[hit.position]);
			}
		});

		it('should return at most the corpus size', () => {
			expect(fitted().search('gravity', 50)).toHaveLength(5);
		});

		it('should break score ties by chunk position', () => {
			const hits = fitted(['gamma delta', 'alpha beta', 'alpha beta']).search('alpha', 3);

			expect(hits.map((hit) => hit.position)).toEqual([1, 2, 0]);
			expect(hits[0].score).toBeCloseTo(hits[1].score);
			expect(hits[2].score).toBe(0);
		});

		it('should be deterministic', () => {
			const index = fitted();
			expect(index.search('moon gravity', 4)).toEqual(index.search('moon gravity', 4));
		});

		it('should reject k below 1 or fractional', () => {
			const index = fitted();

			expect(() => index.search('gravity', 0)).toThrow(RangeError);
			expect(() => index.search('gravity', 1.5)).toThrow(RangeError);
		});

		it('should refuse to search before fitting', () => {
			expect(() => new VectorIndex().search('gravity', 1)).toThrow(NotFittedError);
		});
	});

	describe('transform', () => {
		it('should project texts into unit or zero rows', () => {
			const index = fitted();
			const [known, unknown] = index.transform(['gravity', 'zzz']);

			expect(known).toHaveLength(index.getDimensions());
			expect(Math.hypot(...known)).toBeCloseTo(1);
			expect(unknown.every((value) => value === 0)).toBe(true);
		});

		it('should refuse to transform before fitting', () => {
			expect(() => new VectorIndex().transform(['x'])).toThrow(NotFittedError);
		});
	});

	describe('persist/restore', () => {
		let storage: InMemoryStorageAdapter;

		beforeEach(() => {
			storage = new InMemoryStorageAdapter();
		});

		it('should store three artifacts under the location', async () => {
			await fitted().persist(storage, 'indexes/doc/');

			expect(await storage.keys()).toEqual(['indexes/doc/chunks', 'indexes/doc/index', 'indexes/doc/vocabulary']);
			expect(getIndexArtifactKeys('indexes/doc/')).toEqual({
				vocabulary: 'indexes/doc/vocabulary',
				chunks: 'indexes/doc/chunks',
				index: 'indexes/doc/index',
			});
		});

		it('should answer searches identically after a round trip', async () => {
			const index = fitted();
			await index.persist(storage, 'indexes/doc');

			const restored = await VectorIndex.restore(storage, 'indexes/doc');

			expect(restored.size).toBe(5);
			expect(restored.getDimensions()).toBe(index.getDimensions());
			expect(restored.search('moon tides', 5)).toEqual(index.search('moon tides', 5));
		});

		it('should refuse to persist an unfit index', async () => {
			await expect(new VectorIndex().persist(storage, 'indexes/doc')).rejects.toThrow(NotFittedError);
		});

		it('should name missing artifacts', async () => {
			await fitted().persist(storage, 'indexes/doc');
			await storage.delete('indexes/doc/chunks');

			await expect(VectorIndex.restore(storage, 'indexes/doc')).rejects.toThrow(
				'Index at "indexes/doc" is missing artifacts: chunks',
			);
		});

		it('should report a location with nothing stored as corrupt', async () => {
			await expect(VectorIndex.restore(storage, 'nowhere')).rejects.toThrow(CorruptStateError);
		});

		it('should reject malformed artifacts', async () => {
			await fitted().persist(storage, 'indexes/doc');
			storage._setRaw('indexes/doc/vocabulary', { version: 1, terms: 'gravity' });

			await expect(VectorIndex.restore(storage, 'indexes/doc')).rejects.toThrow(
				'Malformed vocabulary at "indexes/doc"',
			);
		});

		it('should reject artifacts from another schema version', async () => {
			await fitted().persist(storage, 'indexes/doc');
			const chunks = await storage.read<{ version: number; chunks: string[] }>('indexes/doc/chunks');
			storage._setRaw('indexes/doc/chunks', { ...chunks, version: 2 });

			await expect(VectorIndex.restore(storage, 'indexes/doc')).rejects.toThrow(CorruptStateError);
		});

		it('should reject a chunk count that does not match the vectors', async () => {
			await fitted().persist(storage, 'indexes/doc');
			storage._setRaw('indexes/doc/chunks', { version: 1, chunks: [...CORPUS, 'extra'] });

			await expect(VectorIndex.restore(storage, 'indexes/doc')).rejects.toThrow(
				'Index holds 5 vectors for 6 chunks',
			);
		});
	});
});

describe('IndexRegistry', () => {
	it('should replace an index on refit without touching the old handle', () => {
		const registry = new IndexRegistry();
		const first = registry.fit('doc', CORPUS);
		const second = registry.fit('doc', ['alpha beta']);

		expect(registry.get('doc')).toBe(second);
		expect(first.size).toBe(5);
		expect(second.size).toBe(1);
	});

	it('should track and invalidate documents', () => {
		const registry = new IndexRegistry();
		registry.fit('a', CORPUS);
		registry.fit('b', CORPUS);

		expect(registry.documentIds()).toEqual(['a', 'b']);
		expect(registry.invalidate('a')).toBe(true);
		expect(registry.invalidate('a')).toBe(false);
		expect(registry.has('a')).toBe(false);
		expect(registry.get('a')).toBeNull();
	});

	it('should load persisted indexes', async () => {
		const storage = new InMemoryStorageAdapter();
		await fitted().persist(storage, 'indexes/doc');

		const registry = new IndexRegistry();
		const index = await registry.load('doc', storage, 'indexes/doc');

		expect(registry.get('doc')).toBe(index);
		expect(index.search('gravity', 1)[0].position).toBeGreaterThanOrEqual(0);
	});
});
