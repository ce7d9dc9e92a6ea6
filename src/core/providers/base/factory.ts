/**
 * @file factory.ts
 * @description LLM 提供商服务工厂。
 *
 * 将具体的服务类（如 OllamaChatService）与调用方（嵌入网关、生成网关）解耦：
 * 1. 注册并持有各个提供商的构造工厂（ProviderFactory）。
 * 2. `create`: 根据提供商 ID 和配置，返回实现了 `LLMProviderService` 接口的实例。
 * 3. 测试或嵌入方可以 `register` 自己的提供商（例如进程内的假服务）。
 */

import type { LLMProviderService, ProviderConfig } from '../types';
import { OpenAIChatService } from './openai';
import { OllamaChatService } from './ollama';
import { BusinessError, ErrorCode } from '@/core/errors';

/**
 * 提供商工厂函数类型定义。
 * 接收配置(ProviderConfig)，返回具体服务实例或 null（配置无效时）。
 */
export type ProviderFactory = (config: ProviderConfig) => LLMProviderService | null;

/**
 * 提供商服务工厂注册表
 */
export class ProviderServiceFactory {
	/** 内部注册表：Provider ID -> Factory Function */
	private readonly factories = new Map<string, ProviderFactory>();

	constructor() {
		this.registerDefaultProviders();
	}

	private registerDefaultProviders(): void {
		// 本地 Ollama（API Key 可选）
		this.register('ollama', (config) => {
			return new OllamaChatService({
				baseUrl: config.baseUrl,
				apiKey: config.apiKey,
			});
		});

		// OpenAI 及兼容服务
		this.register('openai', (config) => {
			if (!config.apiKey) {
				console.warn('[ProviderServiceFactory] openai provider requires an apiKey');
				return null;
			}
			return new OpenAIChatService({
				baseUrl: config.baseUrl,
				apiKey: config.apiKey,
			});
		});
	}

	/**
	 * 添加（或覆盖）一个提供商构建逻辑。
	 */
	register(providerId: string, factory: ProviderFactory): void {
		this.factories.set(providerId, factory);
	}

	/**
	 * 创建具体服务实例。
	 * 未注册、被禁用或配置无效时抛出 PROVIDER_NOT_FOUND。
	 */
	create(providerId: string, config: ProviderConfig): LLMProviderService {
		const factory = this.factories.get(providerId);
		if (!factory) {
			throw new BusinessError(ErrorCode.PROVIDER_NOT_FOUND, `Provider ${providerId} not found`);
		}
		if (config.enabled === false) {
			throw new BusinessError(ErrorCode.PROVIDER_NOT_FOUND, `Provider ${providerId} is disabled`);
		}
		const service = factory(config);
		if (!service) {
			throw new BusinessError(ErrorCode.PROVIDER_NOT_FOUND, `Provider ${providerId} could not be created from its configuration`);
		}
		return service;
	}
}
