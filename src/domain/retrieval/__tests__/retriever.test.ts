import { NotFittedError } from '@/domain/errors';
import { VectorIndex } from '@/domain/vectorIndex';
import { describe, expect, it } from 'vitest';
import { buildContentSections, combineChunks, retrieveForTopic } from '../retriever';

const CORPUS = [
	'Gravity pulls objects toward the earth.',
	'Plants use light to make sugar.',
	'The moon orbit is shaped by gravity and mass.',
	'Rain falls from clouds over the ocean.',
	'Tides are caused by the gravity of the moon.',
];

function fitted(): VectorIndex {
	const index = new VectorIndex();
	index.fit(CORPUS);
	return index;
}

describe('combineChunks', () => {
	it('should join chunks with a blank line while they fit', () => {
		expect(combineChunks(['aaaa', 'bbbb', 'cccc'], 10)).toBe('aaaa\n\nbbbb');
	});

	it('should stop at the first chunk that does not fit', () => {
		expect(combineChunks(['aaaa', 'bbbbbbbbbb', 'cc'], 10)).toBe('aaaa');
	});

	it('should drop an oversized first chunk rather than cut it', () => {
		expect(combineChunks(['a'.repeat(12)], 10)).toBe('');
	});

	it('should return an empty string for no chunks', () => {
		expect(combineChunks([], 10)).toBe('');
	});
});

describe('retrieveForTopic', () => {
	it('should put the matching chunks first', () => {
		const context = retrieveForTopic(fitted(), 'gravity', 3, 4000);
		const parts = context.split('\n\n');

		expect(parts).toHaveLength(3);
		for (const part of parts) {
			expect(part.toLowerCase()).toContain('gravity');
		}
	});

	it('should combine every searched chunk, even when none matches', () => {
		const index = new VectorIndex();
		index.fit(['Apples grow on trees.', 'Bananas are yellow.', 'Cherries are small and red.']);
		const searched = index.search('gravity', 2).map((hit) => hit.chunk);

		const context = retrieveForTopic(index, 'gravity', 2, 4000);

		expect(searched).toHaveLength(2);
		expect(context).toBe(searched.join('\n\n'));
	});

	it('should never exceed the character budget', () => {
		const context = retrieveForTopic(fitted(), 'gravity', 5, 50);

		expect(context.length).toBeLessThanOrEqual(50);
		expect(CORPUS).toContain(context);
	});
});

describe('buildContentSections', () => {
	it('should deal topic hits into consecutive rank groups', () => {
		const index = fitted();
		const ranked = index.search('gravity', 3).map((hit) => hit.chunk);

		const sections = buildContentSections(index, {
			topic: 'gravity',
			sectionCount: 2,
			chunksPerSection: 2,
			maxLength: 4000,
		});

		expect(sections).toEqual([`${ranked[0]}\n\n${ranked[1]}`, ranked[2]]);
	});

	it('should split the document in reading order without a topic', () => {
		const sections = buildContentSections(fitted(), {
			topic: null,
			sectionCount: 2,
			chunksPerSection: 5,
			maxLength: 4000,
		});

		expect(sections).toEqual([
			`${CORPUS[0]}\n\n${CORPUS[1]}`,
			`${CORPUS[2]}\n\n${CORPUS[3]}\n\n${CORPUS[4]}`,
		]);
	});

	it('should fall back to reading order when the topic matches nothing', () => {
		const sections = buildContentSections(fitted(), {
			topic: 'volcano',
			sectionCount: 1,
			chunksPerSection: 5,
			maxLength: 4000,
		});

		expect(sections).toEqual([CORPUS.join('\n\n')]);
	});

	it('should not create more sections than chunks', () => {
		const sections = buildContentSections(fitted(), {
			topic: null,
			sectionCount: 10,
			chunksPerSection: 5,
			maxLength: 4000,
		});

		expect(sections).toEqual(CORPUS);
	});

	it('should refuse an unfit index', () => {
		expect(() =>
			buildContentSections(new VectorIndex(), {
				topic: null,
				sectionCount: 1,
				chunksPerSection: 5,
				maxLength: 4000,
			}),
		).toThrow(NotFittedError);
	});
});
