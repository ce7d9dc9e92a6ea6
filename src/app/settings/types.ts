/**
 * @file types.ts (Settings)
 * @description 应用设置的类型定义。
 * 包含 AI 服务配置、分块配置、检索配置、导入限制等所有可配置项的接口与默认值。
 */

import type { ProviderConfig, LLMOutputControlSettings } from '@/core/providers/types';

/**
 * 文档分块（Chunking）配置接口。
 * 决定了长文档如何被分割成小块以适配嵌入模型（Embedding）。
 */
export interface ChunkingSettings {
	/**
	 * 每个分块的字符数。
	 * 默认：800
	 */
	chunkSize: number;
	/**
	 * 相邻分块之间的重叠字符数，必须小于 chunkSize。
	 * 默认：150
	 */
	chunkOverlap: number;
}

/**
 * 默认分块设置。
 */
export const DEFAULT_CHUNKING_SETTINGS: ChunkingSettings = {
	chunkSize: 800,
	chunkOverlap: 150,
};

/**
 * 检索与上下文拼装配置。
 */
export interface RetrievalSettings {
	/**
	 * 每次查询返回的最大结果数。
	 */
	topK: number;
	/**
	 * 拼装到提示词中的上下文最大字符数。超出时从排名最低的结果开始丢弃。
	 */
	maxContextLength: number;
}

export const DEFAULT_RETRIEVAL_SETTINGS: RetrievalSettings = {
	topK: 10,
	maxContextLength: 6000,
};

/**
 * 文档导入限制。
 */
export interface IngestionSettings {
	/** 上传文件的最大字节数（默认 10MB） */
	maxUploadSize: number;
	/** 抓取 URL 的超时时间（毫秒） */
	urlFetchTimeoutMs: number;
}

export const DEFAULT_INGESTION_SETTINGS: IngestionSettings = {
	maxUploadSize: 10 * 1024 * 1024,
	urlFetchTimeoutMs: 30000,
};

/**
 * AI 服务核心配置接口。
 */
export interface AIServiceSettings {
	// 使用的提供商 ID（'ollama' | 'openai' 或自行注册的提供商）
	provider: string;
	// 生成模型
	generationModel: string;
	// 嵌入模型
	embeddingModel: string;
	// 每次嵌入请求发送的文本条数
	embeddingBatchSize: number;
	// 各个提供商的具体配置（Base URL、API Key 等）
	llmProviderConfigs: Record<string, ProviderConfig>;
	/**
	 * 生成输出控制（温度、最大 Token 等）。
	 */
	defaultOutputControl?: LLMOutputControlSettings;
}

/**
 * 默认 AI 设置。
 */
export const DEFAULT_AI_SERVICE_SETTINGS: AIServiceSettings = {
	provider: 'ollama',
	generationModel: 'gemma3:1b',
	embeddingModel: 'all-minilm',
	embeddingBatchSize: 32,
	llmProviderConfigs: {
		ollama: { baseUrl: 'http://localhost:11434' },
	},
	defaultOutputControl: {
		temperature: 0.1,
		topP: 0.9,
	},
};

/**
 * 应用根配置接口。
 */
export interface RagSettings {
	// 知识库数据存放目录
	dataStorageFolder: string;

	ai: AIServiceSettings;
	chunking: ChunkingSettings;
	retrieval: RetrievalSettings;
	ingestion: IngestionSettings;
}

/**
 * 初始兜底设置。
 */
export const DEFAULT_SETTINGS: RagSettings = {
	dataStorageFolder: './vector_store',

	ai: DEFAULT_AI_SERVICE_SETTINGS,
	chunking: DEFAULT_CHUNKING_SETTINGS,
	retrieval: DEFAULT_RETRIEVAL_SETTINGS,
	ingestion: DEFAULT_INGESTION_SETTINGS,
};
