/**
 * @file constant.ts
 * @description 通用常量定义文件。
 * 包含知识库文件名、批处理大小、提示语标记等不在设置中暴露的常量。
 */

/*
 * Common constants. Some values are configurable in settings, while others are not -- so they are here.
 */

/**
 * Knowledge base database filename, created inside the configured storage folder.
 *
 * 知识库数据库文件名（存储来源、分块与向量）。
 */
export const KNOWLEDGE_BASE_DB_FILENAME = 'knowledge-base.sqlite';

/**
 * Index state keys for storing index metadata.
 *
 * 在数据库中存储索引状态的键名。
 */
export const INDEX_STATE_KEYS = {
	embeddingModel: 'embedding_model',
	embeddingDimension: 'embedding_dimension',
	createdAt: 'created_at',
} as const;

/**
 * Rows fetched per page when scanning vectors for similarity search.
 *
 * 相似度搜索时每次从数据库读取的向量行数。平衡内存占用与查询效率。
 */
export const SEARCH_SCAN_BATCH_SIZE = 500;

/**
 * Marker put in front of answers that were generated without any retrieved context.
 *
 * 未使用任何检索内容时，答案前附加的标记。
 */
export const NO_SOURCES_MARKER = '[No sources used]';

/**
 * Length of the context preview returned with query results.
 *
 * 查询结果中上下文预览的长度（字符）。
 */
export const CONTEXT_PREVIEW_LENGTH = 500;

/**
 * 记住的失败来源数量上限，超出后最早的失败来源视为 absent。
 */
export const MAX_FAILED_SOURCE_STATES = 1000;

/**
 * Separator placed between context blocks.
 */
export const CONTEXT_BLOCK_SEPARATOR = '\n\n';

/**
 * Number of decimals kept on relevance scores returned to callers.
 */
export const SCORE_DECIMALS = 3;
