/**
 * @file types.ts
 * @description 统一文档模型定义。
 *
 * 上传的文件或抓取的网页先被归一化为纯文本（NormalizedDocument），
 * 之后的分块、嵌入与检索都只基于这段文本。
 */

/**
 * All document type values as a constant array.
 * This is the source of truth for all document types.
 *
 * 文档类型常量数组。所有受支持的格式都在这里定义。
 */
export const DOCUMENT_TYPES = [
	'pdf',
	'docx',
	'txt',
	'url',
] as const;

/**
 * Document type handled by the loaders.
 * Derived from DOCUMENT_TYPES constant array.
 */
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

/**
 * Types that can be uploaded as files (everything except 'url').
 * 可以作为文件上传的类型。
 */
export type FileDocumentType = Exclude<DocumentType, 'url'>;

export const FILE_DOCUMENT_TYPES: readonly FileDocumentType[] = ['pdf', 'docx', 'txt'];

/**
 * Where a source came from.
 */
export type SourceOrigin = 'file' | 'url';

export function isDocumentType(value: string): value is DocumentType {
	return DOCUMENT_TYPES.some(type => type === value);
}

export function isFileDocumentType(value: string): value is FileDocumentType {
	return FILE_DOCUMENT_TYPES.some(type => type === value);
}

/**
 * Raw input for file ingestion.
 * 文件导入的原始输入。
 */
export interface FileInput {
	bytes: Uint8Array;
	/** Declared type of the bytes */
	type: FileDocumentType;
	/** Original file name, used as display name and locator */
	name: string;
}

/**
 * Loader specific facts about a document, e.g. `pageCount` or `title`.
 * Stored with the source.
 */
export type DocumentMetadata = Record<string, string | number>;

/**
 * Plain text extracted from a file or web page.
 * 从文件或网页中提取的纯文本。
 */
export interface NormalizedDocument {
	type: DocumentType;
	origin: SourceOrigin;
	/** File name or URL */
	locator: string;
	/** Human readable name: file name, or page title / URL */
	displayName: string;
	/** Unicode NFC normalized text, never blank */
	text: string;
	/** MD5 of the normalized text */
	contentHash: string;
	metadata: DocumentMetadata;
}
