import type { DocumentLoader } from './types';
import type { DocumentType, FileInput, NormalizedDocument } from '@/core/document/types';
import { buildNormalizedDocument } from './helper/DocumentLoaderHelpers';
import { NormalizationError } from '@/core/errors';

/**
 * Plain Text Document Loader
 *
 * Used for standard text files (.txt). Content must be valid UTF-8;
 * a leading byte order mark is dropped.
 *
 * 纯文本文档加载器
 *
 * 用于处理标准的文本文件（.txt）。内容必须是合法的 UTF-8。
 */
export class TextDocumentLoader implements DocumentLoader {
	/**
	 * Returns the type of document handled: 'txt'.
	 * 返回处理的文档类型：'txt'。
	 */
	getDocumentType(): DocumentType {
		return 'txt';
	}

	getSupportedExtensions(): string[] {
		return ['txt'];
	}

	async load(input: FileInput): Promise<NormalizedDocument> {
		let rawText: string;
		try {
			// fatal: invalid byte sequences throw instead of becoming U+FFFD
			rawText = new TextDecoder('utf-8', { fatal: true }).decode(input.bytes);
		} catch (error) {
			throw new NormalizationError(`File ${input.name} is not valid UTF-8 text`, undefined, error);
		}

		return buildNormalizedDocument({
			type: 'txt',
			origin: 'file',
			locator: input.name,
			displayName: input.name,
			rawText,
		});
	}
}
