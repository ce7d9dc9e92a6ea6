import type { Selectable } from 'kysely';
import type { Database as DbSchema } from '../ddl';

/**
 * Repository Types
 *
 * Row shapes returned by the SQLite repositories. Services map them to the
 * storage-level types in `@/core/storage/types`.
 *
 * 存储库类型：SQLite 存储库返回的行结构，服务层再映射为存储层类型。
 */

export type SourceRow = Selectable<DbSchema['source']>;

/**
 * Chunk row without its embedding.
 * 不含向量的分块行。
 */
export type ChunkRow = Omit<Selectable<DbSchema['chunk']>, 'embedding' | 'embedding_dim'>;

/**
 * Minimal row read while scanning vectors for similarity search.
 * 相似度扫描时读取的最小行。
 */
export type ChunkVectorRow = {
	ordinal: number;
	source_id: string;
	embedding: Buffer;
};

/**
 * Data needed to insert one chunk.
 * 插入一个分块所需的数据。
 */
export type ChunkInsertInput = {
	id: string;
	source_id: string;
	seq: number;
	content: string;
	start_offset: number;
	end_offset: number;
	embedding: Buffer;
	embedding_dim: number;
};
