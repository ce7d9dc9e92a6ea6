import type { UrlLoader } from './types';
import type { NormalizedDocument } from '@/core/document/types';
import { buildNormalizedDocument } from './helper/DocumentLoaderHelpers';
import { ErrorCode, NormalizationError, SourceFetchError } from '@/core/errors';
import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';

/**
 * Elements whose text never belongs to the readable page content.
 */
const NON_CONTENT_SELECTORS = 'script, style, noscript, template';

/**
 * Collapse the text of an HTML page: every line is trimmed, runs of two spaces
 * split phrases, and the non-empty phrases are joined by single spaces.
 *
 * 压缩网页文本：逐行去除首尾空白，按双空格拆分短语，再以单个空格连接非空短语。
 */
export function collapsePageText(text: string): string {
	const phrases: string[] = [];
	for (const line of text.split(/\r\n|\r|\n/)) {
		for (const phrase of line.trim().split('  ')) {
			const trimmed = phrase.trim();
			if (trimmed) phrases.push(trimmed);
		}
	}
	return phrases.join(' ');
}

/**
 * Parse an absolute http(s) URL. Leading and trailing whitespace is ignored.
 * 只接受 http / https 绝对地址。
 */
export function parseHttpUrl(url: string): URL {
	let parsed: URL;
	try {
		parsed = new URL(url.trim());
	} catch (error) {
		throw new NormalizationError(`Invalid URL: ${url}`, ErrorCode.UNSUPPORTED_DOCUMENT_TYPE, error);
	}
	if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
		throw new NormalizationError(
			`Unsupported URL protocol: ${parsed.protocol}`,
			ErrorCode.UNSUPPORTED_DOCUMENT_TYPE,
		);
	}
	return parsed;
}

/**
 * URL Document Loader
 *
 * Fetches a web page over HTTP(S) and extracts its readable text with cheerio.
 * Script and style content is dropped. The page title, when present, becomes the
 * display name; otherwise the URL itself is used.
 *
 * URL 文档加载器
 *
 * 通过 HTTP(S) 获取网页，并使用 cheerio 提取可读文本。
 * 页面标题（若有）作为显示名称，否则使用 URL 本身。
 */
export class UrlDocumentLoader implements UrlLoader {
	constructor(private readonly timeoutMs: number) { }

	async load(url: string): Promise<NormalizedDocument> {
		const parsed = parseHttpUrl(url);
		const html = await this.fetchHtml(parsed.href);

		const $ = cheerio.load(html);
		$(NON_CONTENT_SELECTORS).remove();
		const title = collapsePageText($('title').first().text());
		const root: cheerio.Cheerio<AnyNode> = $('body').length > 0 ? $('body') : $.root();
		const text = collapsePageText(root.text());

		return buildNormalizedDocument({
			type: 'url',
			origin: 'url',
			locator: parsed.href,
			displayName: title || parsed.href,
			rawText: text,
			metadata: title ? { title } : {},
		});
	}

	private async fetchHtml(url: string): Promise<string> {
		let response: Response;
		try {
			response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
		} catch (error) {
			console.error('[UrlDocumentLoader] error fetching URL:', url, error);
			throw new SourceFetchError(url, `Failed to fetch ${url}`, undefined, error);
		}

		if (!response.ok) {
			throw new SourceFetchError(
				url,
				`Failed to fetch ${url}: HTTP ${response.status}`,
				response.status,
			);
		}

		try {
			return await response.text();
		} catch (error) {
			throw new SourceFetchError(url, `Failed to read response body of ${url}`, response.status, error);
		}
	}
}
