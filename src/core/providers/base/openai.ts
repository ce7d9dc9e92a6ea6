/**
 * @file openai.ts
 * @description OpenAI 兼容服务提供商实现类。
 *
 * 对接 OpenAI 官方接口以及所有兼容 OpenAI 协议的服务（vLLM、LM Studio、各类中转站）。
 * 通过 `@ai-sdk/openai` 创建客户端，利用 `ai-sdk-adapter.ts` 完成请求与结果解析。
 */

import type {
	LLMRequest,
	LLMResponse,
	LLMProviderService,
	ModelMetaData,
	LLMStreamEvent,
} from '../types';
import { createOpenAI, type OpenAIProvider } from '@ai-sdk/openai';
import { embedMany, type LanguageModel } from 'ai';
import { blockChat, streamChat } from '../adapter/ai-sdk-adapter';
import { trimTrailingSlash } from '@/core/utils/format-utils';

/** OpenAI 官方 API 的默认基础地址 */
const OPENAI_DEFAULT_BASE = 'https://api.openai.com/v1';

/** 模型列表请求超时 */
const MODEL_LIST_TIMEOUT_MS = 30000;

/** OpenAI 服务的初始化选项接口 */
export interface OpenAIChatServiceOptions {
	/** 支持自定义 API 代理地址 */
	baseUrl?: string;
	apiKey?: string;
}

/**
 * OpenAI 对话服务核心类
 */
export class OpenAIChatService implements LLMProviderService {
	private readonly client: OpenAIProvider;
	private readonly baseUrl: string;

	constructor(private readonly options: OpenAIChatServiceOptions) {
		if (!this.options.apiKey) {
			throw new Error('OpenAI API key is required');
		}
		this.baseUrl = this.options.baseUrl ?? OPENAI_DEFAULT_BASE;
		this.client = createOpenAI({
			apiKey: this.options.apiKey,
			baseURL: this.baseUrl,
		});
	}

	/** 标识当前服务商的 ID */
	getProviderId(): string {
		return 'openai';
	}

	/** 获取具体的底层模型操作对象 */
	modelClient(model: string): LanguageModel {
		// chat completions endpoint is the one compatible servers implement
		return this.client.chat(model);
	}

	async blockChat(request: LLMRequest): Promise<LLMResponse> {
		return blockChat(this.modelClient(request.model), request);
	}

	streamChat(request: LLMRequest): AsyncGenerator<LLMStreamEvent> {
		return streamChat(this.modelClient(request.model), request);
	}

	/** 通过 `/models` 接口获取服务端可用的模型 */
	async getAvailableModels(): Promise<ModelMetaData[]> {
		const response = await fetch(`${trimTrailingSlash(this.baseUrl)}/models`, {
			headers: { Authorization: `Bearer ${this.options.apiKey}` },
			signal: AbortSignal.timeout(MODEL_LIST_TIMEOUT_MS),
		});
		if (!response.ok) {
			throw new Error(`Failed to fetch models: ${response.status} ${response.statusText}`);
		}
		const body: unknown = await response.json();
		if (typeof body !== 'object' || body === null || !('data' in body) || !Array.isArray(body.data)) {
			throw new Error('Invalid response format: data array not found');
		}
		const models: ModelMetaData[] = [];
		for (const model of body.data) {
			if (typeof model === 'object' && model !== null && 'id' in model && typeof model.id === 'string') {
				models.push({ id: model.id, displayName: model.id });
			}
		}
		return models;
	}

	/**
	 * 生成向量（Embedding）
	 */
	async generateEmbeddings(texts: string[], model: string): Promise<number[][]> {
		const result = await embedMany({
			model: this.client.textEmbeddingModel(model),
			values: texts,
			maxRetries: 0,
		});

		return result.embeddings;
	}
}
