/**
 * @file errors.ts
 * @description 业务错误定义与处理工具。
 * 定义了知识库问答流程中的错误代码（ErrorCode）和错误类（BusinessError 及其子类），
 * 并提供工具函数将程序错误转换为用户可读的提示信息。
 */

/**
 * Business error codes for application errors
 *
 * 业务错误代码。用于标识错误的具体类型。
 */
export enum ErrorCode {
	/** 文档解析失败：文件损坏或格式不匹配 */
	NORMALIZATION_FAILED = 'NORMALIZATION_FAILED',
	/** 不支持的文档类型 */
	UNSUPPORTED_DOCUMENT_TYPE = 'UNSUPPORTED_DOCUMENT_TYPE',
	/** 文档超过上传大小限制 */
	DOCUMENT_TOO_LARGE = 'DOCUMENT_TOO_LARGE',
	/** 解析后没有可用文本 */
	EMPTY_DOCUMENT = 'EMPTY_DOCUMENT',
	/** URL 抓取失败（网络、超时、非 2xx 状态） */
	SOURCE_FETCH_FAILED = 'SOURCE_FETCH_FAILED',
	/** 嵌入服务不可用或返回了格式错误的结果 */
	EMBEDDING_SERVICE_UNAVAILABLE = 'EMBEDDING_SERVICE_UNAVAILABLE',
	/** 生成服务不可用或返回了格式错误的结果 */
	GENERATION_SERVICE_UNAVAILABLE = 'GENERATION_SERVICE_UNAVAILABLE',
	/** chunk id 重复：内部不变量被破坏 */
	DUPLICATE_CHUNK = 'DUPLICATE_CHUNK',
	/** 来源不存在 */
	NOT_FOUND = 'NOT_FOUND',
	/** 知识库读写失败 */
	INDEX_IO_FAILED = 'INDEX_IO_FAILED',
	/** 向量维度与知识库记录的不一致 */
	EMBEDDING_DIMENSION_MISMATCH = 'EMBEDDING_DIMENSION_MISMATCH',
	/** 配置非法 */
	CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
	/** 服务商未注册 */
	PROVIDER_NOT_FOUND = 'PROVIDER_NOT_FOUND',
	/** 未知错误 */
	UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Default error message when model/service is unavailable
 *
 * 当模型服务不可用时的默认提示语。
 */
export const MODEL_UNAVAILABLE_MESSAGE = 'Model service is currently unavailable. Please check that the provider is running and the configured models are installed.';

/**
 * Custom error class for business errors
 *
 * 业务异常类。继承自 Error，增加可识别的错误代码（code）。
 */
export class BusinessError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message: string,
		cause?: unknown
	) {
		super(message);
		this.name = 'BusinessError';
		if (cause !== undefined) {
			this.cause = cause;
		}
	}
}

/**
 * Raised when an uploaded file or fetched page cannot be turned into plain text.
 *
 * 文档归一化失败（类型不支持、文件损坏、超出大小、提取不到文本）。
 */
export class NormalizationError extends BusinessError {
	constructor(message: string, code: ErrorCode = ErrorCode.NORMALIZATION_FAILED, cause?: unknown) {
		super(code, message, cause);
		this.name = 'NormalizationError';
	}
}

/**
 * URL could not be fetched.
 */
export class SourceFetchError extends BusinessError {
	constructor(
		public readonly url: string,
		message: string,
		public readonly status?: number,
		cause?: unknown
	) {
		super(ErrorCode.SOURCE_FETCH_FAILED, message, cause);
		this.name = 'SourceFetchError';
	}
}

export class EmbeddingServiceError extends BusinessError {
	constructor(message: string, cause?: unknown) {
		super(ErrorCode.EMBEDDING_SERVICE_UNAVAILABLE, message, cause);
		this.name = 'EmbeddingServiceError';
	}
}

export class GenerationServiceError extends BusinessError {
	constructor(message: string, cause?: unknown) {
		super(ErrorCode.GENERATION_SERVICE_UNAVAILABLE, message, cause);
		this.name = 'GenerationServiceError';
	}
}

/**
 * A chunk id is already present in the knowledge base. Ingestion always deletes
 * the previous chunks of a source first, so this indicates a bug.
 *
 * chunk id 已存在。正常流程不会出现，出现即说明存在 bug。
 */
export class DuplicateChunkError extends BusinessError {
	constructor(public readonly chunkIds: string[]) {
		super(ErrorCode.DUPLICATE_CHUNK, `Duplicate chunk id(s): ${chunkIds.join(', ')}`);
		this.name = 'DuplicateChunkError';
	}
}

export class NotFoundError extends BusinessError {
	constructor(public readonly sourceId: string) {
		super(ErrorCode.NOT_FOUND, `Source not found: ${sourceId}`);
		this.name = 'NotFoundError';
	}
}

/**
 * Knowledge base read/write failure. Fails the current request only; the
 * knowledge base stays usable.
 *
 * 知识库 I/O 错误。只影响当前请求，知识库实例仍可继续使用。
 */
export class IndexStorageError extends BusinessError {
	constructor(message: string, cause?: unknown, code: ErrorCode = ErrorCode.INDEX_IO_FAILED) {
		super(code, message, cause);
		this.name = 'IndexStorageError';
	}
}

export class ConfigurationError extends BusinessError {
	constructor(message: string, cause?: unknown) {
		super(ErrorCode.CONFIGURATION_INVALID, message, cause);
		this.name = 'ConfigurationError';
	}
}

/**
 * Check whether an error is a BusinessError, optionally with the given code.
 */
export function isBusinessError(error: unknown, code?: ErrorCode): error is BusinessError {
	return error instanceof BusinessError && (code === undefined || error.code === code);
}

/**
 * Get user-friendly error message from an error
 *
 * 工具函数：从捕获到的 error 对象中提取用户友好的提示文字。
 */
export function getErrorMessage(error: unknown): string {
	// 针对业务错误的特殊处理
	if (error instanceof BusinessError) {
		if (error.code === ErrorCode.EMBEDDING_SERVICE_UNAVAILABLE ||
			error.code === ErrorCode.GENERATION_SERVICE_UNAVAILABLE ||
			error.code === ErrorCode.PROVIDER_NOT_FOUND) {
			return `${MODEL_UNAVAILABLE_MESSAGE} (${error.message})`;
		}
		return error.message;
	}

	// 针对标准 Error 对象的处理
	if (error instanceof Error) {
		return error.message;
	}

	// 兜底：直接转换为字符串
	return String(error);
}
