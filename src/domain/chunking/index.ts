export type { ChunkingOptions } from './chunker';
export { DEFAULT_CHUNKING_OPTIONS, cleanText, splitIntoChunks } from './chunker';
