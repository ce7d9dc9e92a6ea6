/**
 * @file types.ts
 * @description 文档加载器接口定义。
 *
 * 加载器负责：
 * 1. 识别并读取特定文件类型。
 * 2. 提取文本内容并生成统一的 NormalizedDocument 模型。
 *
 * 解析失败、文件损坏或提取不到文本时抛出 NormalizationError，不返回部分结果。
 */

import type { DocumentType, FileInput, NormalizedDocument } from '@/core/document/types';

/**
 * Document loader interface for uploaded files.
 *
 * 文件加载器接口。
 */
export interface DocumentLoader {
	/**
	 * Get the document type this loader handles.
	 * 获取该加载器处理的文档类型。
	 */
	getDocumentType(): DocumentType;

	/**
	 * Get the file extensions this loader supports.
	 * 获取该加载器支持的文件扩展名列表。
	 */
	getSupportedExtensions(): string[];

	/**
	 * Extract plain text from uploaded bytes.
	 * 从上传的字节中提取纯文本。
	 */
	load(input: FileInput): Promise<NormalizedDocument>;
}

/**
 * Loader for web pages.
 */
export interface UrlLoader {
	load(url: string): Promise<NormalizedDocument>;
}
