export type { ContentSectionOptions } from './retriever';
export {
	CHUNK_SEPARATOR,
	DEFAULT_CONTEXT_MAX_LENGTH,
	buildContentSections,
	combineChunks,
	retrieveForTopic,
} from './retriever';
