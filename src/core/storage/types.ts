/**
 * @file types.ts
 * @description 知识库存储层的数据结构。
 *
 * 来源（Source）是删除与引用的单位；分块（Chunk）是嵌入与检索的单位。
 * 分块一经写入即不可修改，更新来源时在同一事务中删除旧版本并写入新版本。
 */

import type { DocumentMetadata, DocumentType, SourceOrigin } from '@/core/document/types';

/**
 * Source metadata as written by ingestion.
 * 导入时写入的来源元数据。
 */
export interface SourceRecord {
	id: string;
	origin: SourceOrigin;
	/** File name or URL */
	locator: string;
	displayName: string;
	docType: DocumentType;
	contentHash: string;
	charCount: number;
	embeddingModel: string;
	ingestedAt: number;
	/** Page count, page title and the like, as reported by the loader */
	metadata: DocumentMetadata;
}

/**
 * Source as reported back to callers, with its chunk count.
 * 返回给调用方的来源描述（含分块数量）。
 */
export interface SourceDescriptor extends SourceRecord {
	chunkCount: number;
}

/**
 * A chunk ready to be written: text slice plus its embedding.
 * 待写入的分块：文本片段及其向量。
 */
export interface EmbeddedChunk {
	id: string;
	sourceId: string;
	sequenceIndex: number;
	text: string;
	startOffset: number;
	endOffset: number;
	embedding: number[];
}

/**
 * A chunk as read back from the knowledge base.
 */
export interface StoredChunk {
	id: string;
	sourceId: string;
	sequenceIndex: number;
	text: string;
	startOffset: number;
	endOffset: number;
	/** Global insertion order; earlier chunks have smaller ordinals. */
	ordinal: number;
}

/**
 * One similarity search hit.
 * 一条相似度检索结果。
 */
export interface SearchHit {
	chunk: StoredChunk;
	/** Cosine similarity in [-1, 1] */
	score: number;
	source: SourceDescriptor;
}

export interface SearchFilter {
	/** Restrict the search to these sources. An empty list matches nothing. */
	sourceIds?: string[];
}

export interface KnowledgeBaseStats {
	totalSources: number;
	totalChunks: number;
	embeddingModel: string | null;
	embeddingDimension: number | null;
	location: string;
}
