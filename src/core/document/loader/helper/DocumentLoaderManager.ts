/**
 * @file DocumentLoaderManager.ts
 * @description 文档加载器管理器，统一管理各种文件类型的文档加载器，使用策略模式
 */

import type { DocumentLoader } from '../types';
import type { FileDocumentType, FileInput, NormalizedDocument } from '@/core/document/types';
import { isFileDocumentType } from '@/core/document/types';
import type { IngestionSettings } from '@/app/settings/types';
import { ErrorCode, NormalizationError } from '@/core/errors';
import { TextDocumentLoader } from '../TextDocumentLoader';
import { PdfDocumentLoader } from '../PdfDocumentLoader';
import { DocxDocumentLoader } from '../DocxDocumentLoader';
import { UrlDocumentLoader } from '../UrlDocumentLoader';

/**
 * Manages the document loaders for the supported file types using strategy pattern,
 * and checks uploads (size, declared type, extension) before a loader sees them.
 *
 * 使用策略模式管理不同文件类型的文档加载器，并在交给加载器前校验上传内容
 * （大小、声明类型、扩展名）。
 */
export class DocumentLoaderManager {
	private readonly loaderMap = new Map<FileDocumentType, DocumentLoader>();
	private readonly extensionToLoaderMap = new Map<string, DocumentLoader>();
	private readonly urlLoader: UrlDocumentLoader;

	constructor(private readonly settings: IngestionSettings) {
		this.registerLoader(new TextDocumentLoader());
		this.registerLoader(new PdfDocumentLoader());
		this.registerLoader(new DocxDocumentLoader());
		this.urlLoader = new UrlDocumentLoader(settings.urlFetchTimeoutMs);
	}

	/**
	 * Register a document loader.
	 * Automatically maps file extensions to loaders.
	 */
	registerLoader(loader: DocumentLoader): void {
		const docType = loader.getDocumentType();
		if (!isFileDocumentType(docType)) {
			throw new Error(`Loader for '${docType}' cannot be registered as a file loader`);
		}
		// If multiple loaders support the same type, the last one wins
		this.loaderMap.set(docType, loader);

		for (const ext of loader.getSupportedExtensions()) {
			this.extensionToLoaderMap.set(ext.toLowerCase(), loader);
		}
	}

	getLoaderForDocumentType(documentType: FileDocumentType): DocumentLoader | null {
		return this.loaderMap.get(documentType) || null;
	}

	/**
	 * Infer the document type from a file name's extension.
	 */
	getTypeForFileName(name: string): FileDocumentType | null {
		const dot = name.lastIndexOf('.');
		if (dot < 0) return null;
		const extension = name.slice(dot + 1).toLowerCase();
		const docType = this.extensionToLoaderMap.get(extension)?.getDocumentType();
		return docType && isFileDocumentType(docType) ? docType : null;
	}

	/**
	 * Turn an uploaded file into a NormalizedDocument.
	 * 将上传的文件归一化为 NormalizedDocument。
	 */
	async loadFile(input: FileInput): Promise<NormalizedDocument> {
		if (!isFileDocumentType(input.type)) {
			throw new NormalizationError(
				`Unsupported document type: ${String(input.type)}`,
				ErrorCode.UNSUPPORTED_DOCUMENT_TYPE,
			);
		}
		if (input.bytes.byteLength > this.settings.maxUploadSize) {
			throw new NormalizationError(
				`File ${input.name} is ${input.bytes.byteLength} bytes, limit is ${this.settings.maxUploadSize} bytes`,
				ErrorCode.DOCUMENT_TOO_LARGE,
			);
		}

		// A name without a known extension is accepted; a conflicting one is not
		const typeFromName = this.getTypeForFileName(input.name);
		if (typeFromName !== null && typeFromName !== input.type) {
			throw new NormalizationError(
				`File ${input.name} does not match declared type '${input.type}'`,
				ErrorCode.UNSUPPORTED_DOCUMENT_TYPE,
			);
		}

		const loader = this.getLoaderForDocumentType(input.type);
		if (!loader) {
			throw new NormalizationError(
				`No loader registered for type '${input.type}'`,
				ErrorCode.UNSUPPORTED_DOCUMENT_TYPE,
			);
		}
		return await loader.load(input);
	}

	/**
	 * Fetch a web page and turn it into a NormalizedDocument.
	 */
	async loadUrl(url: string): Promise<NormalizedDocument> {
		return await this.urlLoader.load(url);
	}
}
