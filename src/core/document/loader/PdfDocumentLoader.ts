import type { DocumentLoader } from './types';
import type { DocumentType, FileInput, NormalizedDocument } from '@/core/document/types';
import { buildNormalizedDocument } from './helper/DocumentLoaderHelpers';
import { NormalizationError } from '@/core/errors';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

/**
 * Options for PDF.js getDocument calls under Node.
 * Fonts are not rendered, only text is read, so no font or CMap data is fetched.
 */
const PDF_JS_OPTIONS = {
	isEvalSupported: false,
	disableFontFace: true,
	useSystemFonts: false,
};

/**
 * PDF Document Loader
 *
 * Uses the `pdfjs-dist` legacy build (the one that runs under Node) to parse PDF files.
 * Text of every page is extracted; pages are separated by blank lines.
 *
 * PDF 文档加载器
 *
 * 使用 `pdfjs-dist` 的 legacy 构建（可在 Node 下运行）解析 PDF 文件，
 * 提取所有页面的文本，页与页之间以空行分隔。
 */
export class PdfDocumentLoader implements DocumentLoader {
	/**
	 * Returns the type of document handled by this loader.
	 * 返回此加载器处理的文档类型：'pdf'。
	 */
	getDocumentType(): DocumentType {
		return 'pdf';
	}

	getSupportedExtensions(): string[] {
		return ['pdf'];
	}

	async load(input: FileInput): Promise<NormalizedDocument> {
		const { text, pageCount } = await this.extractText(input);
		return buildNormalizedDocument({
			type: 'pdf',
			origin: 'file',
			locator: input.name,
			displayName: input.name,
			rawText: text,
			metadata: { pageCount },
		});
	}

	/**
	 * Internal method to perform text extraction via PDF.js.
	 * 内部方法：使用 PDF.js 提取文本。
	 */
	private async extractText(input: FileInput): Promise<{ text: string; pageCount: number }> {
		// PDF.js takes ownership of the buffer it is given, so hand it a copy
		const loadingTask = getDocument({
			data: new Uint8Array(input.bytes),
			...PDF_JS_OPTIONS,
		});
		try {
			const pdfDocument = await loadingTask.promise;

			const pageTexts: string[] = [];
			for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
				const page = await pdfDocument.getPage(pageNum);
				const textContent = await page.getTextContent();
				let pageText = '';
				for (const item of textContent.items) {
					if ('str' in item) {
						pageText += item.str + (item.hasEOL ? '\n' : ' ');
					}
				}
				pageTexts.push(pageText.trim());
				page.cleanup();
			}

			return { text: pageTexts.join('\n\n'), pageCount: pdfDocument.numPages };
		} catch (error) {
			console.error('[PdfDocumentLoader] error reading PDF file:', input.name, error);
			throw new NormalizationError(`Failed to parse PDF ${input.name}`, undefined, error);
		} finally {
			await loadingTask.destroy();
		}
	}
}
