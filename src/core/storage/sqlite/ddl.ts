/**
 * @file ddl.ts
 * @description 数据库定义语言 (Data Definition Language)，定义了知识库的数据库架构。
 *
 * ## 核心职能
 * 1. **架构定义**：定义来源、分块（含向量）与索引状态三张表。
 * 2. **类型安全**：为 Kysely 提供 TypeScript 接口，确保 SQL 查询在编译期就能捕获错误。
 *
 * ## 数据库概览
 * - **来源**：`source`，一份上传的文件或一个 URL
 * - **分块**：`chunk`，来源文本的连续片段及其向量，`ordinal` 为全局插入序号
 * - **索引状态**：`index_state`，记录嵌入模型与向量维度
 */
import type { Generated } from 'kysely';

export interface Database {
	/**
	 * One ingested file or URL.
	 * 一份已导入的文件或 URL。
	 */
	source: {
		id: string; // Stable id derived from origin + locator | 由来源类型与定位符生成的稳定 ID
		origin: string; // 'file' | 'url'
		locator: string; // File name or URL | 文件名或 URL
		display_name: string; // Name shown in citations | 引用中展示的名称
		doc_type: string; // 'pdf' | 'docx' | 'txt' | 'url'
		content_hash: string; // Hash of the normalized text | 归一化文本的摘要
		char_count: number; // Normalized text length | 归一化文本长度
		chunk_count: number;
		embedding_model: string;
		ingested_at: number; // Timestamp in ms | 导入时间戳（毫秒）
		metadata: string; // JSON object of loader metadata | 加载器元数据（JSON 对象）
	};

	/**
	 * Contiguous slice of a source's normalized text with its embedding.
	 * 来源文本的连续片段及其向量。
	 */
	chunk: {
		ordinal: Generated<number>; // Monotonic insertion order, never reused | 全局插入序号，不复用
		id: string; // `${source_id}:${seq}`
		source_id: string; // Reference to source.id | 对应 source.id
		seq: number; // Sequence index within the source | 在来源中的序号
		content: string;
		start_offset: number; // Inclusive | 起始偏移（含）
		end_offset: number; // Exclusive | 结束偏移（不含）
		embedding: Buffer; // float32 little-endian
		embedding_dim: number;
	};

	/**
	 * Key-value store for index metadata.
	 * 索引元数据键值表。
	 */
	index_state: {
		key: string;
		value: string | null;
	};
}

/**
 * Minimal interface of a raw SQLite handle needed to run migrations.
 */
export interface SqliteDatabaseLike {
	exec(sql: string): unknown;
}

/**
 * Create tables and indexes. Idempotent: safe to run on every open.
 *
 * 创建表与索引。可重复执行。
 */
export function migrateSqliteSchema(db: SqliteDatabaseLike): void {
	db.exec(`
		CREATE TABLE IF NOT EXISTS source (
			id TEXT PRIMARY KEY,
			origin TEXT NOT NULL,
			locator TEXT NOT NULL,
			display_name TEXT NOT NULL,
			doc_type TEXT NOT NULL,
			content_hash TEXT NOT NULL,
			char_count INTEGER NOT NULL,
			chunk_count INTEGER NOT NULL,
			embedding_model TEXT NOT NULL,
			ingested_at INTEGER NOT NULL,
			metadata TEXT NOT NULL DEFAULT '{}'
		);
		CREATE INDEX IF NOT EXISTS idx_source_ingested_at ON source(ingested_at);
	`);

	db.exec(`
		CREATE TABLE IF NOT EXISTS chunk (
			ordinal INTEGER PRIMARY KEY AUTOINCREMENT,
			id TEXT NOT NULL UNIQUE,
			source_id TEXT NOT NULL REFERENCES source(id) ON DELETE CASCADE,
			seq INTEGER NOT NULL,
			content TEXT NOT NULL,
			start_offset INTEGER NOT NULL,
			end_offset INTEGER NOT NULL,
			embedding BLOB NOT NULL,
			embedding_dim INTEGER NOT NULL
		);
		CREATE INDEX IF NOT EXISTS idx_chunk_source_id ON chunk(source_id);
	`);

	db.exec(`
		CREATE TABLE IF NOT EXISTS index_state (
			key TEXT PRIMARY KEY,
			value TEXT
		);
	`);
}
