/**
 * @file ollama.ts
 * @description Ollama 本地服务提供商实现类。
 *
 * 与本地运行的 Ollama 服务对接：
 * 1. 【动态模型发现】通过调用 Ollama 的 `/api/tags` 接口，获取本地已经下载的模型。
 * 2. 【本地化适配】处理了 Base URL 的规范化问题（自动补全 /api 后缀）。
 * 3. 【嵌入】通过 `embedMany` 调用本地嵌入模型（如 all-minilm、nomic-embed-text）。
 */

import type {
	LLMRequest,
	LLMResponse,
	LLMProviderService,
	ModelMetaData,
	LLMStreamEvent,
} from '../types';
import { createOllama, type OllamaProvider } from 'ollama-ai-provider-v2';
import { embedMany, type LanguageModel } from 'ai';
import { blockChat, streamChat } from '../adapter/ai-sdk-adapter';
import { trimTrailingSlash } from '@/core/utils/format-utils';

/** 默认的本地服务超时时间 */
const DEFAULT_OLLAMA_TIMEOUT_MS = 60000;
/** Ollama 默认的本地监听地址 */
const OLLAMA_DEFAULT_BASE = 'http://localhost:11434';

/**
 * 规范化 Ollama Base URL
 *
 * `ollama-ai-provider-v2` 要求基准地址以 `/api` 结尾。
 * `http://localhost:11434` 会被转换为 `http://localhost:11434/api`。
 */
export function normalizeOllamaBaseUrl(baseUrl: string): string {
	// 移除结尾可能的 v1 后缀或多余斜杠
	let normalized = baseUrl.replace(/\/v1\/?$/, '').replace(/\/$/, '');

	if (!normalized.endsWith('/api')) {
		normalized = `${normalized}/api`;
	}

	return normalized;
}

export interface OllamaChatServiceOptions {
	/** 本地 Ollama URL */
	baseUrl?: string;
	/** Ollama 本身不强制要求 API Key，但部分转发层可能需要 */
	apiKey?: string;
}

/**
 * 从 Ollama 接口拉取本地模型列表。请求失败时抛出异常。
 */
async function fetchOllamaModels(baseUrl: string): Promise<ModelMetaData[]> {
	const apiUrl = `${trimTrailingSlash(baseUrl).replace(/\/api$/, '')}/api/tags`;

	// 显式设置超时，避免本地服务卡死时失去响应
	const response = await fetch(apiUrl, {
		method: 'GET',
		headers: {
			'Content-Type': 'application/json',
		},
		signal: AbortSignal.timeout(DEFAULT_OLLAMA_TIMEOUT_MS),
	});

	if (!response.ok) {
		throw new Error(`Failed to fetch models: ${response.status} ${response.statusText}`);
	}

	const data: unknown = await response.json();
	if (typeof data !== 'object' || data === null || !('models' in data) || !Array.isArray(data.models)) {
		throw new Error('Invalid response format: models array not found');
	}

	const models: ModelMetaData[] = [];
	for (const model of data.models) {
		if (typeof model !== 'object' || model === null || !('name' in model) || typeof model.name !== 'string') {
			continue;
		}
		// 展示效果优化：llama3 -> Llama 3
		let displayName = model.name.replace(/([a-z])([0-9])/gi, '$1 $2');
		displayName = displayName.charAt(0).toUpperCase() + displayName.slice(1);
		models.push({ id: model.name, displayName });
	}
	return models;
}

/**
 * Ollama 对话服务核心类。
 */
export class OllamaChatService implements LLMProviderService {
	private readonly client: OllamaProvider;
	private readonly baseUrl: string;

	constructor(options: OllamaChatServiceOptions) {
		this.baseUrl = options.baseUrl ?? OLLAMA_DEFAULT_BASE;
		this.client = createOllama({
			baseURL: normalizeOllamaBaseUrl(this.baseUrl),
			headers: options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : undefined,
		});
	}

	getProviderId(): string {
		return 'ollama';
	}

	/**
	 * 创建可供 AI SDK 调用的模型实例。
	 */
	modelClient(model: string): LanguageModel {
		return this.client(model);
	}

	async blockChat(request: LLMRequest): Promise<LLMResponse> {
		return blockChat(this.modelClient(request.model), request);
	}

	streamChat(request: LLMRequest): AsyncGenerator<LLMStreamEvent> {
		return streamChat(this.modelClient(request.model), request);
	}

	/**
	 * 每次调用都会真实请求一次本地 API，确保能发现新拉取的模型。
	 */
	async getAvailableModels(): Promise<ModelMetaData[]> {
		try {
			return await fetchOllamaModels(this.baseUrl);
		} catch (error) {
			console.error('[OllamaChatService] Error fetching models:', error);
			throw error;
		}
	}

	async generateEmbeddings(texts: string[], model: string): Promise<number[][]> {
		try {
			const result = await embedMany({
				model: this.client.textEmbeddingModel(model),
				values: texts,
				maxRetries: 0,
			});
			return result.embeddings;
		} catch (error) {
			console.error('[OllamaChatService] Error generating embeddings:', error);
			throw error;
		}
	}
}
