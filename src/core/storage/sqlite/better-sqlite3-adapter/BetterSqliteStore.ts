/**
 * File-based SQLite store backed by better-sqlite3 (native module).
 *
 * Advantages:
 * - Native performance
 * - Synchronous API; Kysely's SQLite dialect serializes access to the single connection
 *
 * Durability: WAL journal with `synchronous = FULL`, so a committed transaction
 * survives a crash or power loss once the call returns.
 *
 * 基于 better-sqlite3（原生模块）的文件型 SQLite 存储实现。
 * 使用 WAL 日志与 `synchronous = FULL`，事务提交返回后即已持久化。
 */
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import * as fs from 'fs';
import * as path from 'path';
import { migrateSqliteSchema } from '@/core/storage/sqlite/ddl';
import type { Database as DbSchema } from '@/core/storage/sqlite/ddl';
import type { SqliteDatabase } from '../types';

export const IN_MEMORY_DB = ':memory:';

export class BetterSqliteStore implements SqliteDatabase {
	private readonly kyselyInstance: Kysely<DbSchema>;
	private closed = false;

	private constructor(
		private readonly db: Database.Database,
		private readonly dbPath: string,
	) {
		this.kyselyInstance = new Kysely<DbSchema>({
			dialect: new SqliteDialect({ database: db }),
		});
	}

	/**
	 * Open (or create) a database and run migrations.
	 *
	 * 打开（或创建）数据库并执行建表迁移。
	 *
	 * @param dbPath - Database file path, or ':memory:' for a throwaway database | 数据库文件路径或 ':memory:'
	 */
	static open(dbPath: string): BetterSqliteStore {
		if (dbPath !== IN_MEMORY_DB) {
			fs.mkdirSync(path.dirname(dbPath), { recursive: true });
		}

		const db = new Database(dbPath);

		// 外键约束（级联删除分块）
		db.pragma('foreign_keys = ON');
		// 锁冲突时等待而不是立即失败
		db.pragma('busy_timeout = 5000');
		if (dbPath !== IN_MEMORY_DB) {
			db.pragma('journal_mode = WAL');
		}
		// 每次提交都落盘
		db.pragma('synchronous = FULL');

		try {
			migrateSqliteSchema(db);
		} catch (error) {
			db.close();
			throw error;
		}

		console.debug(`[BetterSqliteStore] Opened database at ${dbPath}`);
		return new BetterSqliteStore(db, dbPath);
	}

	kysely(): Kysely<DbSchema> {
		return this.kyselyInstance;
	}

	location(): string {
		return this.dbPath;
	}

	/**
	 * Checkpoint the WAL into the main file and close the connection. Idempotent.
	 *
	 * 将 WAL 合并回主文件并关闭连接。重复调用无副作用。
	 */
	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		if (this.dbPath !== IN_MEMORY_DB) {
			this.db.pragma('wal_checkpoint(TRUNCATE)');
		}
		await this.kyselyInstance.destroy();
		// the driver only closes the handle if it was ever initialized
		if (this.db.open) {
			this.db.close();
		}
		console.debug(`[BetterSqliteStore] Closed database at ${this.dbPath}`);
	}
}
