/**
 * @file DocumentLoaderHelpers.ts
 * @description 文档加载器共用的文本清洗与文档组装工具。
 */

import type { DocumentType, NormalizedDocument, SourceOrigin } from '@/core/document/types';
import { ErrorCode, NormalizationError } from '@/core/errors';
import { hashMD5 } from '@/core/utils/hash-utils';

/**
 * Clean text produced by an extractor:
 * Unicode NFC, LF line endings, no NUL characters, no leading/trailing whitespace.
 *
 * 清洗提取出的文本：NFC 规范化、统一换行为 LF、去除 NUL 字符、去除首尾空白。
 */
export function normalizeExtractedText(raw: string): string {
	return raw
		.normalize('NFC')
		.replace(/\r\n?/g, '\n')
		.replace(/\u0000/g, '')
		.trim();
}

/**
 * Assemble a NormalizedDocument from extracted text.
 * Blank text after cleaning is rejected with EMPTY_DOCUMENT.
 *
 * 由提取出的文本组装 NormalizedDocument。清洗后为空则抛出 EMPTY_DOCUMENT。
 */
export function buildNormalizedDocument(params: {
	type: DocumentType;
	origin: SourceOrigin;
	locator: string;
	displayName: string;
	rawText: string;
	metadata?: Record<string, string | number>;
}): NormalizedDocument {
	const text = normalizeExtractedText(params.rawText);
	if (text.length === 0) {
		throw new NormalizationError(
			`No text could be extracted from ${params.displayName}`,
			ErrorCode.EMPTY_DOCUMENT,
		);
	}
	return {
		type: params.type,
		origin: params.origin,
		locator: params.locator,
		displayName: params.displayName,
		text,
		contentHash: hashMD5(text),
		metadata: params.metadata ?? {},
	};
}
