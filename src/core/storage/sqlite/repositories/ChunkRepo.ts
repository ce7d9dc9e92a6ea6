import type { Kysely } from 'kysely';
import type { Database as DbSchema } from '../ddl';
import type { ChunkInsertInput, ChunkRow, ChunkVectorRow } from './types';

/**
 * Rows per INSERT statement. Keeps the bound parameter count well below
 * SQLite's variable limit (8 columns per row).
 */
const INSERT_BATCH_SIZE = 100;

/**
 * Chunk Repository
 *
 * Manages the `chunk` table: text slices with their float32 embeddings.
 * `ordinal` is the global insertion order used to break score ties.
 *
 * 分块存储库
 *
 * 管理 `chunk` 表：文本片段及其 float32 向量。
 * `ordinal` 为全局插入顺序，用于相同分数时的排序。
 */
export class ChunkRepo {
	constructor(private readonly db: Kysely<DbSchema>) {}

	/**
	 * Inserts chunks in input order, so ordinals follow that order.
	 * 按输入顺序插入分块，ordinal 随之递增。
	 */
	async insertMany(chunks: ChunkInsertInput[]): Promise<void> {
		for (let i = 0; i < chunks.length; i += INSERT_BATCH_SIZE) {
			await this.db
				.insertInto('chunk')
				.values(chunks.slice(i, i + INSERT_BATCH_SIZE))
				.execute();
		}
	}

	/**
	 * Returns which of the given chunk ids already exist.
	 * 返回给定 ID 中已存在的分块 ID。
	 */
	async findExistingIds(ids: string[]): Promise<string[]> {
		const existing: string[] = [];
		for (let i = 0; i < ids.length; i += INSERT_BATCH_SIZE) {
			const rows = await this.db
				.selectFrom('chunk')
				.select('id')
				.where('id', 'in', ids.slice(i, i + INSERT_BATCH_SIZE))
				.execute();
			existing.push(...rows.map(row => row.id));
		}
		return existing;
	}

	/**
	 * Page through chunk vectors in ordinal order.
	 * 按 ordinal 顺序分页读取向量。
	 *
	 * @param afterOrdinal - Exclusive lower bound; pass 0 for the first page
	 * @param sourceIds - Restrict to these sources when given
	 */
	async scanVectors(afterOrdinal: number, limit: number, sourceIds?: string[]): Promise<ChunkVectorRow[]> {
		let query = this.db
			.selectFrom('chunk')
			.select(['ordinal', 'source_id', 'embedding'])
			.where('ordinal', '>', afterOrdinal);
		if (sourceIds) {
			query = query.where('source_id', 'in', sourceIds);
		}
		return await query
			.orderBy('ordinal', 'asc')
			.limit(limit)
			.execute();
	}

	async getByOrdinals(ordinals: number[]): Promise<ChunkRow[]> {
		if (!ordinals.length) return [];
		return await this.db
			.selectFrom('chunk')
			.select(['ordinal', 'id', 'source_id', 'seq', 'content', 'start_offset', 'end_offset'])
			.where('ordinal', 'in', ordinals)
			.execute();
	}

	/**
	 * Chunks of one source in sequence order.
	 */
	async listBySourceId(sourceId: string): Promise<ChunkRow[]> {
		return await this.db
			.selectFrom('chunk')
			.select(['ordinal', 'id', 'source_id', 'seq', 'content', 'start_offset', 'end_offset'])
			.where('source_id', '=', sourceId)
			.orderBy('seq', 'asc')
			.execute();
	}

	async countAll(): Promise<number> {
		const row = await this.db
			.selectFrom('chunk')
			.select(eb => eb.fn.countAll<number>().as('count'))
			.executeTakeFirst();
		return Number(row?.count ?? 0);
	}

	async deleteAll(): Promise<void> {
		await this.db.deleteFrom('chunk').execute();
	}
}
