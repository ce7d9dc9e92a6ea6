/**
 * @file SettingsLoader.ts
 * @description 设置加载与规格化工具。
 * 负责将 `settings.json` 中保存的原始数据转换为强类型的 `RagSettings` 对象，
 * 补全缺失字段、修正非法值，并叠加环境变量覆盖。
 */

import { readFile } from 'fs/promises';
import {
	type AIServiceSettings,
	type ChunkingSettings,
	DEFAULT_AI_SERVICE_SETTINGS,
	DEFAULT_CHUNKING_SETTINGS,
	DEFAULT_INGESTION_SETTINGS,
	DEFAULT_RETRIEVAL_SETTINGS,
	DEFAULT_SETTINGS,
	type IngestionSettings,
	type RagSettings,
	type RetrievalSettings,
} from '@/app/settings/types';
import type { LLMOutputControlSettings, ProviderConfig } from '@/core/providers/types';
import { ConfigurationError } from '@/core/errors';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 辅助函数：安全获取字符串，否则返回默认值。
 */
function getString(source: unknown, defaultValue: string): string {
	return typeof source === 'string' && source.length > 0 ? source : defaultValue;
}

/**
 * 辅助函数：安全获取有限数字，否则返回默认值。
 */
function getNumber(source: unknown, defaultValue: number): number {
	return typeof source === 'number' && Number.isFinite(source) ? source : defaultValue;
}

function getOptionalNumber(source: unknown): number | undefined {
	return typeof source === 'number' && Number.isFinite(source) ? source : undefined;
}

function getOptionalString(source: unknown): string | undefined {
	return typeof source === 'string' && source.length > 0 ? source : undefined;
}

/**
 * 规格化单个提供商配置，只保留已知字段。
 */
function normalizeProviderConfig(raw: RawRecord): ProviderConfig {
	const config: ProviderConfig = {};
	if (typeof raw.enabled === 'boolean') {
		config.enabled = raw.enabled;
	}
	config.apiKey = getOptionalString(raw.apiKey);
	config.baseUrl = getOptionalString(raw.baseUrl);
	return config;
}

function normalizeOutputControl(raw: RawRecord): LLMOutputControlSettings {
	return {
		temperature: getOptionalNumber(raw.temperature),
		topP: getOptionalNumber(raw.topP),
		maxOutputTokens: getOptionalNumber(raw.maxOutputTokens),
	};
}

/**
 * 规格化 AI 服务设置。
 *
 * 逻辑：
 * 1. 优先读取 raw 数据。
 * 2. 缺失或类型错误的字段回退到 `DEFAULT_AI_SERVICE_SETTINGS`。
 * 3. 提供商配置与默认配置合并，用户配置覆盖同名提供商。
 */
function normalizeAIServiceSettings(raw: RawRecord): AIServiceSettings {
	const rawAI = raw.ai;
	if (!isRecord(rawAI)) {
		return {
			...DEFAULT_AI_SERVICE_SETTINGS,
			llmProviderConfigs: { ...DEFAULT_AI_SERVICE_SETTINGS.llmProviderConfigs },
		};
	}

	const settings: AIServiceSettings = {
		provider: getString(rawAI.provider, DEFAULT_AI_SERVICE_SETTINGS.provider),
		generationModel: getString(rawAI.generationModel, DEFAULT_AI_SERVICE_SETTINGS.generationModel),
		embeddingModel: getString(rawAI.embeddingModel, DEFAULT_AI_SERVICE_SETTINGS.embeddingModel),
		embeddingBatchSize: getNumber(rawAI.embeddingBatchSize, DEFAULT_AI_SERVICE_SETTINGS.embeddingBatchSize),
		llmProviderConfigs: { ...DEFAULT_AI_SERVICE_SETTINGS.llmProviderConfigs },
		defaultOutputControl: DEFAULT_AI_SERVICE_SETTINGS.defaultOutputControl,
	};

	if (isRecord(rawAI.llmProviderConfigs)) {
		for (const [providerId, rawConfig] of Object.entries(rawAI.llmProviderConfigs)) {
			if (isRecord(rawConfig)) {
				settings.llmProviderConfigs[providerId] = normalizeProviderConfig(rawConfig);
			}
		}
	}

	if (isRecord(rawAI.defaultOutputControl)) {
		settings.defaultOutputControl = normalizeOutputControl(rawAI.defaultOutputControl);
	}

	return settings;
}

function normalizeChunkingSettings(raw: RawRecord): ChunkingSettings {
	const rawChunking = isRecord(raw.chunking) ? raw.chunking : {};
	return {
		chunkSize: getNumber(rawChunking.chunkSize, DEFAULT_CHUNKING_SETTINGS.chunkSize),
		chunkOverlap: getNumber(rawChunking.chunkOverlap, DEFAULT_CHUNKING_SETTINGS.chunkOverlap),
	};
}

function normalizeRetrievalSettings(raw: RawRecord): RetrievalSettings {
	const rawRetrieval = isRecord(raw.retrieval) ? raw.retrieval : {};
	return {
		topK: getNumber(rawRetrieval.topK, DEFAULT_RETRIEVAL_SETTINGS.topK),
		maxContextLength: getNumber(rawRetrieval.maxContextLength, DEFAULT_RETRIEVAL_SETTINGS.maxContextLength),
	};
}

function normalizeIngestionSettings(raw: RawRecord): IngestionSettings {
	const rawIngestion = isRecord(raw.ingestion) ? raw.ingestion : {};
	return {
		maxUploadSize: getNumber(rawIngestion.maxUploadSize, DEFAULT_INGESTION_SETTINGS.maxUploadSize),
		urlFetchTimeoutMs: getNumber(rawIngestion.urlFetchTimeoutMs, DEFAULT_INGESTION_SETTINGS.urlFetchTimeoutMs),
	};
}

/**
 * 加载并规格化设置。
 * 即便原始数据损坏或部分缺失，也要通过 `DEFAULT_SETTINGS` 凑齐一个完整的 `RagSettings` 对象。
 * 本函数只做规格化，不做取值范围校验（见 validateSettings）。
 */
export function normalizeSettings(data: unknown): RagSettings {
	const raw: RawRecord = isRecord(data) ? data : {};

	return {
		dataStorageFolder: getString(raw.dataStorageFolder, DEFAULT_SETTINGS.dataStorageFolder),
		ai: normalizeAIServiceSettings(raw),
		chunking: normalizeChunkingSettings(raw),
		retrieval: normalizeRetrievalSettings(raw),
		ingestion: normalizeIngestionSettings(raw),
	};
}

/**
 * 解析整数形式的环境变量。未设置时返回 undefined，格式错误时抛出 ConfigurationError。
 */
function parseIntegerEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
	const value = env[name];
	if (value === undefined || value.trim() === '') {
		return undefined;
	}
	if (!/^-?\d+$/.test(value.trim())) {
		throw new ConfigurationError(`Environment variable ${name} must be an integer, got "${value}"`);
	}
	return Number.parseInt(value, 10);
}

/**
 * 叠加环境变量覆盖。返回新的设置对象，不修改入参。
 *
 * | 变量 | 设置项 |
 * | --- | --- |
 * | LLM_PROVIDER | ai.provider |
 * | OLLAMA_BASE_URL | ai.llmProviderConfigs.ollama.baseUrl |
 * | OPENAI_BASE_URL / OPENAI_API_KEY | ai.llmProviderConfigs.openai |
 * | OLLAMA_MODEL | ai.generationModel |
 * | EMBEDDING_MODEL | ai.embeddingModel |
 * | VECTOR_STORE_PATH | dataStorageFolder |
 * | CHUNK_SIZE / CHUNK_OVERLAP | chunking |
 * | TOP_K_RESULTS / MAX_CONTEXT_LENGTH | retrieval |
 * | MAX_FILE_SIZE | ingestion.maxUploadSize |
 */
export function applyEnvOverrides(settings: RagSettings, env: NodeJS.ProcessEnv): RagSettings {
	const llmProviderConfigs = { ...settings.ai.llmProviderConfigs };
	if (env.OLLAMA_BASE_URL) {
		llmProviderConfigs.ollama = { ...llmProviderConfigs.ollama, baseUrl: env.OLLAMA_BASE_URL };
	}
	if (env.OPENAI_BASE_URL || env.OPENAI_API_KEY) {
		llmProviderConfigs.openai = {
			...llmProviderConfigs.openai,
			...(env.OPENAI_BASE_URL ? { baseUrl: env.OPENAI_BASE_URL } : {}),
			...(env.OPENAI_API_KEY ? { apiKey: env.OPENAI_API_KEY } : {}),
		};
	}

	return {
		dataStorageFolder: env.VECTOR_STORE_PATH || settings.dataStorageFolder,
		ai: {
			...settings.ai,
			provider: env.LLM_PROVIDER || settings.ai.provider,
			generationModel: env.OLLAMA_MODEL || settings.ai.generationModel,
			embeddingModel: env.EMBEDDING_MODEL || settings.ai.embeddingModel,
			llmProviderConfigs,
		},
		chunking: {
			chunkSize: parseIntegerEnv(env, 'CHUNK_SIZE') ?? settings.chunking.chunkSize,
			chunkOverlap: parseIntegerEnv(env, 'CHUNK_OVERLAP') ?? settings.chunking.chunkOverlap,
		},
		retrieval: {
			topK: parseIntegerEnv(env, 'TOP_K_RESULTS') ?? settings.retrieval.topK,
			maxContextLength: parseIntegerEnv(env, 'MAX_CONTEXT_LENGTH') ?? settings.retrieval.maxContextLength,
		},
		ingestion: {
			...settings.ingestion,
			maxUploadSize: parseIntegerEnv(env, 'MAX_FILE_SIZE') ?? settings.ingestion.maxUploadSize,
		},
	};
}

/**
 * 校验设置取值范围，非法时抛出 ConfigurationError。
 */
export function validateSettings(settings: RagSettings): RagSettings {
	const { chunkSize, chunkOverlap } = settings.chunking;
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
	}
	if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
		throw new ConfigurationError(`chunkOverlap must satisfy 0 <= chunkOverlap < chunkSize (${chunkSize}), got ${chunkOverlap}`);
	}
	if (!Number.isInteger(settings.retrieval.topK) || settings.retrieval.topK <= 0) {
		throw new ConfigurationError(`topK must be a positive integer, got ${settings.retrieval.topK}`);
	}
	if (settings.retrieval.maxContextLength <= 0) {
		throw new ConfigurationError(`maxContextLength must be positive, got ${settings.retrieval.maxContextLength}`);
	}
	if (settings.ingestion.maxUploadSize <= 0) {
		throw new ConfigurationError(`maxUploadSize must be positive, got ${settings.ingestion.maxUploadSize}`);
	}
	if (!Number.isInteger(settings.ai.embeddingBatchSize) || settings.ai.embeddingBatchSize <= 0) {
		throw new ConfigurationError(`embeddingBatchSize must be a positive integer, got ${settings.ai.embeddingBatchSize}`);
	}
	return settings;
}

export interface LoadSettingsOptions {
	/** settings.json 路径；不传则只使用默认值与环境变量 */
	settingsFile?: string;
	env?: NodeJS.ProcessEnv;
}

/**
 * 读取设置文件（可选）→ 规格化 → 环境变量覆盖 → 校验。
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<RagSettings> {
	let data: unknown = undefined;
	if (options.settingsFile) {
		let content: string;
		try {
			content = await readFile(options.settingsFile, 'utf-8');
		} catch (error) {
			console.error(`[SettingsLoader] Failed to read settings file ${options.settingsFile}:`, error);
			throw new ConfigurationError(`Cannot read settings file ${options.settingsFile}`, error);
		}
		try {
			data = JSON.parse(content);
		} catch (error) {
			console.error(`[SettingsLoader] Settings file ${options.settingsFile} is not valid JSON:`, error);
			throw new ConfigurationError(`Settings file ${options.settingsFile} is not valid JSON`, error);
		}
	}
	return validateSettings(applyEnvOverrides(normalizeSettings(data), options.env ?? process.env));
}
