/**
 * @file KnowledgeBase.ts
 * @description 知识库：来源、分块与向量的持久化存储，以及余弦相似度检索。
 *
 * 知识库是显式持有的对象：`KnowledgeBase.open()` 打开，`close()` 关闭，
 * 由调用方传给编排器，不存在全局单例；同一进程内可以同时存在多个实例。
 *
 * 每个写操作（insert / replace / deleteBySource / clear）都是单个 SQLite 事务，
 * 返回时已提交落盘。
 */

import * as path from 'path';
import type { Kysely } from 'kysely';
import { BetterSqliteStore, IN_MEMORY_DB } from './sqlite/better-sqlite3-adapter/BetterSqliteStore';
import type { Database as DbSchema } from './sqlite/ddl';
import type { SqliteDatabase } from './sqlite/types';
import { SourceRepo } from './sqlite/repositories/SourceRepo';
import { ChunkRepo } from './sqlite/repositories/ChunkRepo';
import { IndexStateRepo } from './sqlite/repositories/IndexStateRepo';
import type { ChunkRow, SourceRow } from './sqlite/repositories/types';
import type {
	EmbeddedChunk,
	KnowledgeBaseStats,
	SearchFilter,
	SearchHit,
	SourceDescriptor,
	SourceRecord,
	StoredChunk,
} from './types';
import { isDocumentType, type DocumentMetadata } from '@/core/document/types';
import { INDEX_STATE_KEYS, KNOWLEDGE_BASE_DB_FILENAME, SEARCH_SCAN_BATCH_SIZE } from '@/core/constant';
import { BusinessError, DuplicateChunkError, ErrorCode, IndexStorageError } from '@/core/errors';
import { cosineSimilarity, decodeEmbedding, encodeEmbedding, isFiniteVector, vectorNorm } from '@/core/utils/vector-utils';

export interface KnowledgeBaseOpenOptions {
	/**
	 * Folder holding the database file, or ':memory:' for a throwaway knowledge base.
	 * 数据库文件所在目录；传入 ':memory:' 则使用内存数据库。
	 */
	storageFolder: string;
}

type Candidate = { ordinal: number; score: number };

export class KnowledgeBase {
	private constructor(private readonly store: SqliteDatabase) {}

	/**
	 * Open (or create) a knowledge base.
	 * 打开（或创建）知识库。
	 */
	static async open(options: KnowledgeBaseOpenOptions): Promise<KnowledgeBase> {
		const dbPath = options.storageFolder === IN_MEMORY_DB
			? IN_MEMORY_DB
			: path.join(options.storageFolder, KNOWLEDGE_BASE_DB_FILENAME);

		let store: BetterSqliteStore;
		try {
			store = BetterSqliteStore.open(dbPath);
		} catch (error) {
			console.error('[KnowledgeBase] Failed to open knowledge base:', dbPath, error);
			throw new IndexStorageError(`Failed to open knowledge base at ${dbPath}`, error);
		}

		const kb = new KnowledgeBase(store);
		await kb.withStorageErrors('initialize', async () => {
			const state = new IndexStateRepo(store.kysely());
			if ((await state.get(INDEX_STATE_KEYS.createdAt)) === null) {
				await state.set(INDEX_STATE_KEYS.createdAt, String(Date.now()));
			}
		});
		return kb;
	}

	location(): string {
		return this.store.location();
	}

	async close(): Promise<void> {
		await this.store.close();
	}

	/**
	 * Add a source and its chunks in one transaction.
	 * Nothing is written when any chunk id (or the source id) already exists.
	 *
	 * 在同一事务中写入来源及其全部分块。若任一分块 ID（或来源 ID）已存在，则不写入任何内容。
	 *
	 * @throws DuplicateChunkError when a chunk id or the source already exists
	 * @throws IndexStorageError on dimension mismatch or I/O failure
	 */
	async insert(source: SourceRecord, chunks: EmbeddedChunk[]): Promise<SourceDescriptor> {
		const dimension = this.validateChunks(source, chunks);

		return await this.withStorageErrors('insert', async () => {
			return await this.store.kysely().transaction().execute(async trx => {
				return await this.writeSource(trx, source, chunks, dimension);
			});
		});
	}

	/**
	 * Swap whatever is stored under `source.id` for the given version in one
	 * transaction. Readers see the old version or the new one, never neither;
	 * when the write fails the old version stays as it was.
	 *
	 * 在同一事务中用新版本替换同 ID 的来源。读者只会看到旧版本或新版本；写入失败时旧版本保持不变。
	 *
	 * @throws DuplicateChunkError when a chunk id belongs to another source
	 * @throws IndexStorageError on dimension mismatch or I/O failure
	 */
	async replace(source: SourceRecord, chunks: EmbeddedChunk[]): Promise<SourceDescriptor> {
		const dimension = this.validateChunks(source, chunks);

		return await this.withStorageErrors('replace', async () => {
			return await this.store.kysely().transaction().execute(async trx => {
				await new SourceRepo(trx).deleteById(source.id);
				return await this.writeSource(trx, source, chunks, dimension);
			});
		});
	}

	/**
	 * Up to `topK` chunks by descending cosine similarity; on equal scores the
	 * earlier inserted chunk comes first.
	 *
	 * 按余弦相似度降序返回至多 topK 个分块；分数相同时先插入的在前。
	 *
	 * @throws IndexStorageError when the query dimension differs from the index's
	 */
	async search(queryVector: number[], topK: number, filter: SearchFilter = {}): Promise<SearchHit[]> {
		if (topK <= 0) return [];
		if (filter.sourceIds && filter.sourceIds.length === 0) return [];
		if (!isFiniteVector(queryVector) || queryVector.length === 0) {
			throw new IndexStorageError('Query vector must be a non-empty list of finite numbers');
		}

		return await this.withStorageErrors('search', async () => {
			// one read transaction: the scan and the row lookup see the same snapshot
			return await this.store.kysely().transaction().execute(async trx => {
				const state = new IndexStateRepo(trx);
				const dimension = await state.getInt(INDEX_STATE_KEYS.embeddingDimension);
				if (dimension === null) {
					return [];
				}
				if (dimension !== queryVector.length) {
					throw new IndexStorageError(
						`Query vector has dimension ${queryVector.length}, index has dimension ${dimension}`,
						undefined,
						ErrorCode.EMBEDDING_DIMENSION_MISMATCH,
					);
				}

				const top = await this.scanTopK(trx, queryVector, topK, filter.sourceIds);
				return await this.loadHits(trx, top);
			});
		});
	}

	/**
	 * Remove a source and its chunks. Idempotent.
	 * 删除来源及其分块，可重复调用。
	 *
	 * @returns whether anything was removed
	 */
	async deleteBySource(sourceId: string): Promise<boolean> {
		return await this.withStorageErrors('deleteBySource', async () => {
			return await this.store.kysely().transaction().execute(async trx => {
				const deleted = await new SourceRepo(trx).deleteById(sourceId);
				return deleted > 0;
			});
		});
	}

	/**
	 * Remove every source and chunk, and forget the recorded embedding dimension.
	 * 清空全部来源与分块，并重置已记录的向量维度。
	 *
	 * @returns number of removed sources
	 */
	async clear(): Promise<number> {
		return (await this.clearSources()).length;
	}

	/**
	 * Same as `clear`, returning the removed sources as they were read inside
	 * the clearing transaction.
	 */
	async clearSources(): Promise<SourceDescriptor[]> {
		return await this.withStorageErrors('clear', async () => {
			const removed = await this.store.kysely().transaction().execute(async trx => {
				const sources = new SourceRepo(trx);
				const rows = await sources.listAll();
				await new ChunkRepo(trx).deleteAll();
				await sources.deleteAll();
				await new IndexStateRepo(trx).deleteKeys([
					INDEX_STATE_KEYS.embeddingDimension,
					INDEX_STATE_KEYS.embeddingModel,
				]);
				return rows.map(row => toSourceDescriptor(row));
			});
			console.log(`[KnowledgeBase] Cleared ${removed.length} source(s)`);
			return removed;
		});
	}

	/**
	 * All sources with their chunk counts, ordered by ingestion time then id.
	 */
	async listSources(): Promise<SourceDescriptor[]> {
		return await this.withStorageErrors('listSources', async () => {
			const rows = await new SourceRepo(this.store.kysely()).listAll();
			return rows.map(row => toSourceDescriptor(row));
		});
	}

	async getSource(sourceId: string): Promise<SourceDescriptor | undefined> {
		return await this.withStorageErrors('getSource', async () => {
			const row = await new SourceRepo(this.store.kysely()).getById(sourceId);
			return row ? toSourceDescriptor(row) : undefined;
		});
	}

	/**
	 * Chunks of one source in sequence order.
	 */
	async getChunks(sourceId: string): Promise<StoredChunk[]> {
		return await this.withStorageErrors('getChunks', async () => {
			const rows = await new ChunkRepo(this.store.kysely()).listBySourceId(sourceId);
			return rows.map(row => toStoredChunk(row));
		});
	}

	async stats(): Promise<KnowledgeBaseStats> {
		return await this.withStorageErrors('stats', async () => {
			const db = this.store.kysely();
			const state = new IndexStateRepo(db);
			return {
				totalSources: await new SourceRepo(db).countAll(),
				totalChunks: await new ChunkRepo(db).countAll(),
				embeddingModel: await state.get(INDEX_STATE_KEYS.embeddingModel),
				embeddingDimension: await state.getInt(INDEX_STATE_KEYS.embeddingDimension),
				location: this.location(),
			};
		});
	}

	private async writeSource(
		trx: Kysely<DbSchema>,
		source: SourceRecord,
		chunks: EmbeddedChunk[],
		dimension: number | null,
	): Promise<SourceDescriptor> {
		const sources = new SourceRepo(trx);
		const chunkRepo = new ChunkRepo(trx);

		const chunkIds = chunks.map(chunk => chunk.id);
		const existing = await chunkRepo.findExistingIds(chunkIds);
		if (existing.length > 0) {
			throw new DuplicateChunkError(existing);
		}
		if (await sources.existsById(source.id)) {
			throw new DuplicateChunkError(chunkIds);
		}

		if (dimension !== null) {
			await this.checkAndRecordDimension(new IndexStateRepo(trx), dimension, source.embeddingModel);
		}

		await sources.insert({
			id: source.id,
			origin: source.origin,
			locator: source.locator,
			display_name: source.displayName,
			doc_type: source.docType,
			content_hash: source.contentHash,
			char_count: source.charCount,
			chunk_count: chunks.length,
			embedding_model: source.embeddingModel,
			ingested_at: source.ingestedAt,
			metadata: JSON.stringify(source.metadata),
		});
		await chunkRepo.insertMany(chunks.map(chunk => ({
			id: chunk.id,
			source_id: chunk.sourceId,
			seq: chunk.sequenceIndex,
			content: chunk.text,
			start_offset: chunk.startOffset,
			end_offset: chunk.endOffset,
			embedding: encodeEmbedding(chunk.embedding),
			embedding_dim: chunk.embedding.length,
		})));

		return { ...source, chunkCount: chunks.length };
	}

	/**
	 * Checks the input before any database work.
	 * @returns the shared embedding dimension, or null for an empty chunk list
	 */
	private validateChunks(source: SourceRecord, chunks: EmbeddedChunk[]): number | null {
		const seen = new Set<string>();
		const duplicates: string[] = [];
		let dimension: number | null = null;

		for (const chunk of chunks) {
			if (seen.has(chunk.id)) duplicates.push(chunk.id);
			seen.add(chunk.id);

			if (chunk.sourceId !== source.id) {
				throw new IndexStorageError(`Chunk ${chunk.id} does not belong to source ${source.id}`);
			}
			if (!isFiniteVector(chunk.embedding) || chunk.embedding.length === 0) {
				throw new IndexStorageError(`Chunk ${chunk.id} has an empty or non-finite embedding`);
			}
			if (dimension === null) {
				dimension = chunk.embedding.length;
			} else if (chunk.embedding.length !== dimension) {
				throw new IndexStorageError(
					`Chunk ${chunk.id} has dimension ${chunk.embedding.length}, expected ${dimension}`,
					undefined,
					ErrorCode.EMBEDDING_DIMENSION_MISMATCH,
				);
			}
		}

		if (duplicates.length > 0) {
			throw new DuplicateChunkError(duplicates);
		}
		return dimension;
	}

	private async checkAndRecordDimension(state: IndexStateRepo, dimension: number, embeddingModel: string): Promise<void> {
		const recorded = await state.getInt(INDEX_STATE_KEYS.embeddingDimension);
		if (recorded === null) {
			await state.set(INDEX_STATE_KEYS.embeddingDimension, String(dimension));
			await state.set(INDEX_STATE_KEYS.embeddingModel, embeddingModel);
			return;
		}
		if (recorded !== dimension) {
			throw new IndexStorageError(
				`Embedding dimension ${dimension} does not match the knowledge base dimension ${recorded}. Clear the knowledge base before switching embedding models.`,
				undefined,
				ErrorCode.EMBEDDING_DIMENSION_MISMATCH,
			);
		}
		const recordedModel = await state.get(INDEX_STATE_KEYS.embeddingModel);
		if (recordedModel !== null && recordedModel !== embeddingModel) {
			console.warn(`[KnowledgeBase] Embedding model changed from ${recordedModel} to ${embeddingModel} with the same dimension`);
		}
	}

	/**
	 * Score every stored vector page by page and keep the best `topK`.
	 * Candidates stay sorted by score desc, then ordinal asc.
	 */
	private async scanTopK(db: Kysely<DbSchema>, queryVector: number[], topK: number, sourceIds?: string[]): Promise<Candidate[]> {
		const chunkRepo = new ChunkRepo(db);
		const queryNorm = vectorNorm(queryVector);
		const top: Candidate[] = [];
		let afterOrdinal = 0;

		while (true) {
			const rows = await chunkRepo.scanVectors(afterOrdinal, SEARCH_SCAN_BATCH_SIZE, sourceIds);
			for (const row of rows) {
				const score = cosineSimilarity(queryVector, decodeEmbedding(row.embedding), queryNorm);
				insertCandidate(top, { ordinal: row.ordinal, score }, topK);
			}
			if (rows.length < SEARCH_SCAN_BATCH_SIZE) break;
			afterOrdinal = rows[rows.length - 1].ordinal;
		}
		return top;
	}

	private async loadHits(db: Kysely<DbSchema>, top: Candidate[]): Promise<SearchHit[]> {
		if (!top.length) return [];
		const chunkRows = await new ChunkRepo(db).getByOrdinals(top.map(c => c.ordinal));
		const chunkByOrdinal = new Map(chunkRows.map(row => [row.ordinal, row]));
		const sourceIds = [...new Set(chunkRows.map(row => row.source_id))];
		const sourceRows = await new SourceRepo(db).getByIds(sourceIds);
		const sourceById = new Map(sourceRows.map(row => [row.id, toSourceDescriptor(row)]));

		const hits: SearchHit[] = [];
		for (const candidate of top) {
			const chunkRow = chunkByOrdinal.get(candidate.ordinal);
			const source = chunkRow ? sourceById.get(chunkRow.source_id) : undefined;
			if (!chunkRow || !source) {
				throw new IndexStorageError(`Chunk with ordinal ${candidate.ordinal} vanished during search`);
			}
			hits.push({ chunk: toStoredChunk(chunkRow), score: candidate.score, source });
		}
		return hits;
	}

	/**
	 * Business errors pass through; anything else is an I/O failure of this request.
	 * 业务错误原样抛出，其余错误包装为 IndexStorageError。
	 */
	private async withStorageErrors<T>(operation: string, task: () => Promise<T>): Promise<T> {
		try {
			return await task();
		} catch (error) {
			if (error instanceof BusinessError) {
				throw error;
			}
			console.error(`[KnowledgeBase] ${operation} failed:`, error);
			throw new IndexStorageError(`Knowledge base ${operation} failed`, error);
		}
	}
}

/**
 * Insert into a list kept sorted by score desc, then ordinal asc, capped at `limit`.
 */
function insertCandidate(top: Candidate[], candidate: Candidate, limit: number): void {
	let index = top.length;
	while (index > 0 && ranksBefore(candidate, top[index - 1])) {
		index--;
	}
	if (index >= limit) return;
	top.splice(index, 0, candidate);
	if (top.length > limit) top.pop();
}

function ranksBefore(a: Candidate, b: Candidate): boolean {
	return a.score > b.score || (a.score === b.score && a.ordinal < b.ordinal);
}

function toSourceDescriptor(row: SourceRow): SourceDescriptor {
	if (!isDocumentType(row.doc_type)) {
		throw new IndexStorageError(`Source ${row.id} has unknown document type '${row.doc_type}'`);
	}
	return {
		id: row.id,
		origin: row.origin === 'url' ? 'url' : 'file',
		locator: row.locator,
		displayName: row.display_name,
		docType: row.doc_type,
		contentHash: row.content_hash,
		charCount: row.char_count,
		embeddingModel: row.embedding_model,
		ingestedAt: row.ingested_at,
		metadata: parseMetadata(row.metadata),
		chunkCount: row.chunk_count,
	};
}

/**
 * Reads the stored metadata JSON, keeping only string and number values.
 */
function parseMetadata(json: string): DocumentMetadata {
	let parsed: unknown;
	try {
		parsed = JSON.parse(json);
	} catch (error) {
		throw new IndexStorageError('Source metadata is not valid JSON', error);
	}
	const metadata: DocumentMetadata = {};
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		return metadata;
	}
	for (const [key, value] of Object.entries(parsed)) {
		if (typeof value === 'string' || typeof value === 'number') {
			metadata[key] = value;
		}
	}
	return metadata;
}

function toStoredChunk(row: ChunkRow): StoredChunk {
	return {
		id: row.id,
		sourceId: row.source_id,
		sequenceIndex: row.seq,
		text: row.content,
		startOffset: row.start_offset,
		endOffset: row.end_offset,
		ordinal: row.ordinal,
	};
}
