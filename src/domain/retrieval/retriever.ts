/**
 * Topic retrieval and context assembly
 *
 * Turns index hits into bounded prompt contexts. Chunks are never cut:
 * a chunk that does not fit the remaining budget is dropped whole.
 */

import { NotFittedError } from '@/domain/errors';
import type { VectorIndex } from '@/domain/vectorIndex';

export const CHUNK_SEPARATOR = '\n\n';

export interface ContentSectionOptions {
	/** Retrieval query; null groups chunks in document order */
	topic: string | null;
	/** Number of contexts wanted (one per generation batch) */
	sectionCount: number;
	/** Chunks retrieved per section */
	chunksPerSection: number;
	/** Character budget of each section */
	maxLength: number;
}

export const DEFAULT_CONTEXT_MAX_LENGTH = 4000;

/**
 * Concatenate chunks with a blank line between them, stopping before the
 * first chunk that would push the total (separator included) past `maxLength`
 */
export function combineChunks(chunks: readonly string[], maxLength: number = DEFAULT_CONTEXT_MAX_LENGTH): string {
	let combined = '';

	for (const chunk of chunks) {
		const addition = combined.length === 0 ? chunk : CHUNK_SEPARATOR + chunk;
		if (combined.length + addition.length > maxLength) {
			break;
		}
		combined += addition;
	}

	return combined;
}

/**
 * Retrieve the chunks most relevant to a topic as one context string
 *
 * @param index - Fitted vector index
 * @param topic - Free-text topic
 * @param k - Chunks to retrieve
 * @param maxLength - Character budget
 * @returns Searched chunks by descending score, within the budget
 * @throws NotFittedError if the index is unfit
 */
export function retrieveForTopic(
	index: VectorIndex,
	topic: string,
	k = 5,
	maxLength: number = DEFAULT_CONTEXT_MAX_LENGTH,
): string {
	const hits = index.search(topic, k);
	return combineChunks(
		hits.map((hit) => hit.chunk),
		maxLength,
	);
}

function groupInDocumentOrder(chunks: readonly string[], sectionCount: number): string[][] {
	const count = Math.max(1, Math.min(sectionCount, chunks.length));
	const groups: string[][] = [];
	for (let i = 0; i < count; i++) {
		const start = Math.floor((i * chunks.length) / count);
		const end = Math.floor(((i + 1) * chunks.length) / count);
		groups.push(chunks.slice(start, end));
	}
	return groups;
}

/**
 * Build one context per generation batch
 *
 * With a topic, the top `chunksPerSection × sectionCount` hits are dealt into
 * consecutive rank groups. Without a topic, or when nothing matches it, the
 * document is split evenly in reading order. Always returns at least one
 * section.
 *
 * @throws NotFittedError if the index is unfit
 */
export function buildContentSections(index: VectorIndex, options: ContentSectionOptions): string[] {
	if (!index.isFitted) {
		throw new NotFittedError();
	}
	const sectionCount = Math.max(1, options.sectionCount);
	const chunksPerSection = Math.max(1, options.chunksPerSection);
	const { maxLength } = options;

	if (options.topic !== null) {
		const k = Math.max(1, Math.min(chunksPerSection * sectionCount, index.size));
		const hits = index.search(options.topic, k).filter((hit) => hit.score > 0);
		const sections: string[] = [];
		for (let start = 0; start < hits.length; start += chunksPerSection) {
			const section = combineChunks(
				hits.slice(start, start + chunksPerSection).map((hit) => hit.chunk),
				maxLength,
			);
			if (section.length > 0) {
				sections.push(section);
			}
		}
		if (sections.length > 0) {
			return sections;
		}
	}

	const sections = groupInDocumentOrder(index.getChunks(), sectionCount)
		.map((group) => combineChunks(group, maxLength))
		.filter((section) => section.length > 0);
	return sections.length > 0 ? sections : [''];
}
