import type { SearchHit } from '@/core/storage/types';

/**
 * Search hit for a txt source with the given chunk.
 */
export function makeHit(
	sourceId: string,
	text: string,
	options: { score?: number; sequenceIndex?: number; chunkCount?: number; displayName?: string } = {},
): SearchHit {
	const sequenceIndex = options.sequenceIndex ?? 0;
	return {
		chunk: {
			id: `${sourceId}:${sequenceIndex}`,
			sourceId,
			sequenceIndex,
			text,
			startOffset: 0,
			endOffset: Array.from(text).length,
			ordinal: 1,
		},
		score: options.score ?? 0.5,
		source: {
			id: sourceId,
			origin: 'file',
			locator: `${sourceId}.txt`,
			displayName: options.displayName ?? `${sourceId}.txt`,
			docType: 'txt',
			contentHash: `hash-${sourceId}`,
			charCount: 100,
			embeddingModel: 'test-embed',
			ingestedAt: 1000,
			metadata: {},
			chunkCount: options.chunkCount ?? 1,
		},
	};
}
