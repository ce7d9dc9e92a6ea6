/**
 * @file types.ts
 * @description 检索增强问答（RAG）流程的数据结构。
 */

import type { SearchHit, SourceDescriptor } from '@/core/storage/types';

/**
 * Contiguous slice of a source's normalized text.
 * 来源文本的连续片段。
 */
export interface Chunk {
	/** `${sourceId}:${sequenceIndex}` */
	id: string;
	sourceId: string;
	sequenceIndex: number;
	text: string;
	/** Inclusive start offset in code points */
	startOffset: number;
	/** Exclusive end offset in code points */
	endOffset: number;
}

/**
 * One retrieved chunk with its similarity score, best first.
 * 一条检索结果（分块 + 相似度 + 来源信息）。
 */
export type RetrievalResult = SearchHit;

export interface RetrieveOptions {
	/** Restrict retrieval to these sources */
	sourceIds?: string[];
}

/**
 * Output of prompt assembly.
 * 提示词拼装结果。
 */
export interface AssembledPrompt {
	prompt: string;
	/** Results whose text made it into the context, in rank order */
	usedResults: RetrievalResult[];
	/** False when no result was available and the ungrounded template was used */
	grounded: boolean;
	/** The context text sent to the model ('' when ungrounded) */
	context: string;
}

/**
 * A source cited by an answer.
 * 答案引用的来源。
 */
export interface Citation {
	sourceId: string;
	displayName: string;
	/** Best similarity among the used chunks of this source, rounded to 3 decimals */
	score: number;
	/** e.g. "Chunk 2 of 5" for the best matching chunk */
	chunkLabel: string;
}

export interface QueryOptions {
	topK?: number;
	sourceIds?: string[];
	/** Defaults to true. When false the result carries no citations. */
	includeSources?: boolean;
}

export interface StreamQueryOptions extends QueryOptions {
	signal?: AbortSignal;
}

export interface QueryResult {
	answer: string;
	citations: Citation[];
	grounded: boolean;
	/** First characters of the context sent to the model */
	contextPreview: string;
}

/**
 * Events of a streaming query: fragments, then citations, then end.
 * 流式查询事件：先是若干文本片段，然后是引用，最后是结束标记。
 */
export type QueryStreamEvent =
	| { type: 'fragment'; text: string }
	| { type: 'citations'; citations: Citation[]; grounded: boolean; contextPreview: string }
	| { type: 'end' };

/**
 * Per-source ingestion state.
 *
 * absent -> ingesting -> ready | failed; ready -> absent on deletion;
 * failed -> ingesting on retry. A failed re-ingest of a ready source keeps the
 * stored version and goes back to ready.
 */
export type SourceState = 'absent' | 'ingesting' | 'ready' | 'failed';

export interface SourceStateChange {
	sourceId: string;
	displayName: string;
	from: SourceState;
	to: SourceState;
	/** Set when an ingestion attempt failed, with `to` being 'failed' or, when the old version was kept, 'ready' */
	error?: unknown;
}

export type SourceStateListener = (change: SourceStateChange) => void;

/**
 * Health summary of the pipeline's collaborators.
 * 系统状态概要。
 */
export interface SystemStatus {
	provider: string;
	generationModel: string;
	/** Whether the generation model is listed by the provider */
	modelAvailable: boolean;
	/** Set when the provider could not be reached */
	providerError?: string;
	embeddingModel: string;
	storagePath: string;
	knowledgeBase: {
		totalSources: number;
		totalChunks: number;
		sources: SourceDescriptor[];
	};
}
