import type { DocumentLoader } from './types';
import type { DocumentType, FileInput, NormalizedDocument } from '@/core/document/types';
import { buildNormalizedDocument } from './helper/DocumentLoaderHelpers';
import { NormalizationError } from '@/core/errors';
import mammoth from 'mammoth';

/**
 * DOCX Document Loader
 *
 * Uses the `mammoth` library to extract raw text from Microsoft Word (.docx) files.
 * Legacy binary .doc files are not supported by mammoth and are rejected.
 *
 * DOCX 文档加载器
 *
 * 使用 `mammoth` 库从 Microsoft Word (.docx) 文件中提取原始文本。
 */
export class DocxDocumentLoader implements DocumentLoader {
	/**
	 * 返回此加载器处理的文档类型：'docx'。
	 */
	getDocumentType(): DocumentType {
		return 'docx';
	}

	getSupportedExtensions(): string[] {
		return ['docx'];
	}

	async load(input: FileInput): Promise<NormalizedDocument> {
		let rawText: string;
		try {
			const result = await mammoth.extractRawText({ buffer: Buffer.from(input.bytes) });
			rawText = result.value;
			for (const message of result.messages) {
				console.debug(`[DocxDocumentLoader] ${input.name}: ${message.type} ${message.message}`);
			}
		} catch (error) {
			console.error('[DocxDocumentLoader] error reading DOCX file:', input.name, error);
			throw new NormalizationError(`Failed to parse DOCX ${input.name}`, undefined, error);
		}

		return buildNormalizedDocument({
			type: 'docx',
			origin: 'file',
			locator: input.name,
			displayName: input.name,
			rawText,
		});
	}
}
