import type { Insertable, Kysely } from 'kysely';
import type { Database as DbSchema } from '../ddl';
import type { SourceRow } from './types';

/**
 * Source Repository
 *
 * Manages the `source` table. Deleting a source cascades to its chunks
 * through the foreign key.
 *
 * 来源存储库：管理 `source` 表。删除来源时通过外键级联删除其分块。
 */
export class SourceRepo {
	constructor(private readonly db: Kysely<DbSchema>) {}

	async insert(source: Insertable<DbSchema['source']>): Promise<void> {
		await this.db.insertInto('source').values(source).execute();
	}

	async existsById(id: string): Promise<boolean> {
		const row = await this.db
			.selectFrom('source')
			.select('id')
			.where('id', '=', id)
			.executeTakeFirst();
		return row !== undefined;
	}

	async getById(id: string): Promise<SourceRow | undefined> {
		return await this.db
			.selectFrom('source')
			.selectAll()
			.where('id', '=', id)
			.executeTakeFirst();
	}

	async getByIds(ids: string[]): Promise<SourceRow[]> {
		if (!ids.length) return [];
		return await this.db
			.selectFrom('source')
			.selectAll()
			.where('id', 'in', ids)
			.execute();
	}

	/**
	 * All sources ordered by ingestion time, then id.
	 * 按导入时间、ID 排序的全部来源。
	 */
	async listAll(): Promise<SourceRow[]> {
		return await this.db
			.selectFrom('source')
			.selectAll()
			.orderBy('ingested_at', 'asc')
			.orderBy('id', 'asc')
			.execute();
	}

	async countAll(): Promise<number> {
		const row = await this.db
			.selectFrom('source')
			.select(eb => eb.fn.countAll<number>().as('count'))
			.executeTakeFirst();
		return Number(row?.count ?? 0);
	}

	/**
	 * @returns number of deleted sources (0 or 1)
	 */
	async deleteById(id: string): Promise<number> {
		const result = await this.db.deleteFrom('source').where('id', '=', id).executeTakeFirst();
		return Number(result.numDeletedRows);
	}

	/**
	 * @returns number of deleted sources
	 */
	async deleteAll(): Promise<number> {
		const result = await this.db.deleteFrom('source').executeTakeFirst();
		return Number(result.numDeletedRows);
	}
}
