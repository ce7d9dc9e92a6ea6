import type { Kysely } from 'kysely';
import type { Database as DbSchema } from '../ddl';

/**
 * Index State Repository
 *
 * Manages the `index_state` table, a small persistent key-value store inside
 * the knowledge base. It records the embedding model and vector dimension the
 * index was built with, and when the index was created.
 *
 * 索引状态存储库
 *
 * 管理 `index_state` 表：知识库内的小型持久化键值存储，
 * 记录建立索引所用的嵌入模型、向量维度以及索引创建时间。
 */
export class IndexStateRepo {
	constructor(private readonly db: Kysely<DbSchema>) {}

	/**
	 * Retrieves the value associated with a key.
	 * 检索与键关联的值。
	 *
	 * @returns The string value or null if not found.
	 */
	async get(key: string): Promise<string | null> {
		const row = await this.db
			.selectFrom('index_state')
			.select(['value'])
			.where('key', '=', key)
			.executeTakeFirst();
		return row?.value ?? null;
	}

	/**
	 * Integer value of a key, or null when missing or not an integer.
	 */
	async getInt(key: string): Promise<number | null> {
		const value = await this.get(key);
		if (value === null) return null;
		const parsed = Number.parseInt(value, 10);
		return Number.isFinite(parsed) ? parsed : null;
	}

	/**
	 * Sets a value for a key, inserting or overwriting.
	 * 为键设置值（不存在则插入，存在则覆盖）。
	 */
	async set(key: string, value: string): Promise<void> {
		await this.db
			.insertInto('index_state')
			.values({ key, value })
			.onConflict(oc => oc.column('key').doUpdateSet({ value }))
			.execute();
	}

	async deleteKeys(keys: string[]): Promise<void> {
		if (!keys.length) return;
		await this.db.deleteFrom('index_state').where('key', 'in', keys).execute();
	}
}
