/**
 * Document chunking for the vector index.
 *
 * Splits extracted document text with LangChain's RecursiveCharacterTextSplitter,
 * preferring paragraph, then line, then sentence, then word boundaries.
 */

import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';

export interface ChunkingOptions {
	/** Target maximum chunk length in characters */
	chunkSize: number;
	/** Characters shared by neighbouring chunks */
	chunkOverlap: number;
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
	chunkSize: 2000,
	chunkOverlap: 50,
};

const SEPARATORS = ['\n\n', '\n', '. ', ' ', ''];

/**
 * Normalize line endings, collapse runs of spaces and excess blank lines
 */
export function cleanText(text: string): string {
	return text
		.replace(/\r\n?/g, '\n')
		.replace(/[ \t\f\v]+/g, ' ')
		.replace(/ *\n */g, '\n')
		.replace(/\n{3,}/g, '\n\n')
		.trim();
}

/**
 * Split document text into ordered chunks
 *
 * @returns Non-empty chunks in reading order; [] for blank text
 */
export async function splitIntoChunks(
	text: string,
	options: Partial<ChunkingOptions> = {},
): Promise<string[]> {
	const { chunkSize, chunkOverlap } = { ...DEFAULT_CHUNKING_OPTIONS, ...options };
	if (chunkOverlap >= chunkSize) {
		throw new RangeError(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`);
	}

	const cleaned = cleanText(text);
	if (cleaned.length === 0) {
		return [];
	}

	const splitter = new RecursiveCharacterTextSplitter({
		chunkSize,
		chunkOverlap,
		separators: SEPARATORS,
	});
	const chunks = await splitter.splitText(cleaned);
	return chunks.map((chunk) => chunk.trim()).filter((chunk) => chunk.length > 0);
}
