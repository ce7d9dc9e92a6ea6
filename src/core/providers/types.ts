/**
 * @file types.ts
 * @description LLM 提供商类型定义核心文件。
 * 定义了嵌入与生成能力的统一接口。不论是本地的 Ollama 还是 OpenAI 兼容服务，
 * 都以同样的格式进行配置和调用。
 *
 * 主要职责：
 * 1. 【配置层】ProviderConfig，存储 Base URL、API Key 等参数。
 * 2. 【调用层】LLMProviderService，统一的阻塞 / 流式生成与批量嵌入接口。
 * 3. 【事件层】LLMStreamEvent，流式生成过程中产生的事件。
 */

import type { FinishReason, LanguageModelUsage } from 'ai';

/**
 * 提供商配置接口
 */
export interface ProviderConfig {
	/** 是否启用该服务 */
	enabled?: boolean;
	/** 访问凭证 */
	apiKey?: string;
	/** 代理地址或私有化部署地址 */
	baseUrl?: string;
}

/**
 * 模型元数据
 */
export interface ModelMetaData {
	/** 原始 ID */
	id: string;
	/** 用户界面显示的友好名称 */
	displayName: string;
}

export interface LLMProviderService {
	blockChat(request: LLMRequest): Promise<LLMResponse>;
	streamChat(request: LLMRequest): AsyncGenerator<LLMStreamEvent>;
	/**
	 * Get provider ID
	 */
	getProviderId(): string;
	/**
	 * Get list of available models for this provider.
	 * Throws when the provider cannot be reached.
	 */
	getAvailableModels(): Promise<ModelMetaData[]>;
	/**
	 * Generate embeddings for texts.
	 * @param texts - Array of texts to generate embeddings for
	 * @param model - Model identifier for embedding generation
	 * @returns Promise resolving to array of embedding vectors, one per text, in input order
	 */
	generateEmbeddings(texts: string[], model: string): Promise<number[][]>;
}

export type LLMRequest = {
	provider: string;
	model: string;
	system?: string;
	/** Single-turn prompt text. */
	prompt: string;
	/**
	 * LLM output control settings.
	 * If not provided, uses model defaults.
	 */
	outputControl?: LLMOutputControlSettings;
	abortSignal?: AbortSignal;
};

export type LLMUsage = LanguageModelUsage;

export type LLMResponse = {
	/**
	 * The generated text.
	 */
	text: string;
	/**
	 * The reason why the generation finished.
	 */
	finishReason: FinishReason;
	/**
	 * The token usage of the call.
	 */
	usage: LLMUsage;
};

export type LLMStreamEvent =
	{ type: 'text-delta'; text: string; } |
	{ type: 'complete'; usage?: LLMUsage, durationMs?: number } |
	{ type: 'error'; error: Error, durationMs?: number }
	;

/**
 * LLM output control settings.
 * These settings control the generation behavior of language models.
 */
export interface LLMOutputControlSettings {
	/**
	 * Temperature setting (0-2).
	 * Default: undefined (uses model default)
	 */
	temperature?: number;
	/**
	 * Top-p (nucleus sampling) setting (0-1).
	 */
	topP?: number;
	/**
	 * Max output tokens.
	 * Default: undefined (uses model default)
	 */
	maxOutputTokens?: number;
}
