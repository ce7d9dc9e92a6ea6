import type { Database as DbSchema } from './ddl';
import type { Kysely } from 'kysely';

/**
 * SQLite Storage Types and Interfaces
 *
 * Abstraction over the SQLite backend. Repositories interact with the database
 * through Kysely queries without knowing which engine is running.
 *
 * SQLite 存储类型与接口
 *
 * 通过此接口，存储库可以使用标准的 Kysely 查询与数据库交互，而无需知道正在运行的具体引擎。
 */

/**
 * Unified interface for SQLite database operations.
 * SQLite 数据库操作的统一接口。
 */
export interface SqliteDatabase {
	/**
	 * Returns the Kysely instance for type-safe query building.
	 * 返回用于类型安全查询构建的 Kysely 实例。
	 */
	kysely(): Kysely<DbSchema>;

	/**
	 * Location of the database: a file path, or ':memory:'.
	 */
	location(): string;

	/**
	 * Properly closes the database connection and releases resources.
	 * 正确关闭数据库连接并释放资源。
	 */
	close(): Promise<void>;
}
