import { TextDocumentLoader } from '@/core/document/loader/TextDocumentLoader';
import { PdfDocumentLoader } from '@/core/document/loader/PdfDocumentLoader';
import { DocxDocumentLoader } from '@/core/document/loader/DocxDocumentLoader';
import { UrlDocumentLoader, collapsePageText, parseHttpUrl } from '@/core/document/loader/UrlDocumentLoader';
import { DocumentLoaderManager } from '@/core/document/loader/helper/DocumentLoaderManager';
import { normalizeExtractedText } from '@/core/document/loader/helper/DocumentLoaderHelpers';
import type { FileDocumentType, FileInput } from '@/core/document/types';
import { ErrorCode, NormalizationError, SourceFetchError } from '@/core/errors';
import { hashMD5 } from '@/core/utils/hash-utils';

type PdfTextItem = { str: string; hasEOL: boolean } | { type: string };

interface PdfMockState {
	pages: PdfTextItem[][];
	error: Error | null;
	destroyed: number;
}

interface DocxMockState {
	text: string;
	error: Error | null;
}

const pdfState = vi.hoisted((): PdfMockState => ({ pages: [], error: null, destroyed: 0 }));

const docxState = vi.hoisted((): DocxMockState => ({ text: '', error: null }));

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
	getDocument: () => ({
		promise: pdfState.error
			? Promise.reject(pdfState.error)
			: Promise.resolve({
				numPages: pdfState.pages.length,
				getPage: async (pageNum: number) => ({
					getTextContent: async () => ({ items: pdfState.pages[pageNum - 1] }),
					cleanup: () => true,
				}),
			}),
		destroy: async () => {
			pdfState.destroyed++;
		},
	}),
}));

vi.mock('mammoth', () => ({
	default: {
		extractRawText: async () => {
			if (docxState.error) throw docxState.error;
			return { value: docxState.text, messages: [{ type: 'warning', message: 'Unrecognised style' }] };
		},
	},
}));

function file(name: string, type: FileDocumentType, content: string | Uint8Array): FileInput {
	const bytes = typeof content === 'string' ? new TextEncoder().encode(content) : content;
	return { name, type, bytes };
}

function htmlResponse(body: string, status = 200): Response {
	return new Response(body, { status, headers: { 'content-type': 'text/html' } });
}

describe('normalizeExtractedText', () => {
	it('composes characters, unifies line endings and strips NUL', () => {
		expect(normalizeExtractedText('  café\r\nline\rend\u0000  ')).toBe('café\nline\nend');
	});
});

describe('TextDocumentLoader', () => {
	const loader = new TextDocumentLoader();

	it('decodes UTF-8 and drops the byte order mark', async () => {
		const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...new TextEncoder().encode('hello\r\nworld')]);

		const doc = await loader.load(file('notes.txt', 'txt', bytes));

		expect(doc).toEqual({
			type: 'txt',
			origin: 'file',
			locator: 'notes.txt',
			displayName: 'notes.txt',
			text: 'hello\nworld',
			contentHash: hashMD5('hello\nworld'),
			metadata: {},
		});
	});

	it('rejects invalid UTF-8', async () => {
		const error = await loader.load(file('bad.txt', 'txt', new Uint8Array([0x61, 0xff]))).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(NormalizationError);
		expect(error).toMatchObject({ code: ErrorCode.NORMALIZATION_FAILED, message: 'File bad.txt is not valid UTF-8 text' });
	});

	it('rejects whitespace-only content as empty', async () => {
		await expect(loader.load(file('blank.txt', 'txt', ' \n '))).rejects.toMatchObject({
			code: ErrorCode.EMPTY_DOCUMENT,
			message: 'No text could be extracted from blank.txt',
		});
	});
});

describe('PdfDocumentLoader', () => {
	const loader = new PdfDocumentLoader();

	beforeEach(() => {
		pdfState.pages = [];
		pdfState.error = null;
		pdfState.destroyed = 0;
	});

	it('joins the text of every page', async () => {
		pdfState.pages = [
			[
				{ str: 'Hello', hasEOL: false },
				{ str: 'world', hasEOL: true },
				{ type: 'beginMarkedContent' },
				{ str: 'Line two', hasEOL: false },
			],
			[{ str: 'Page two', hasEOL: false }],
		];

		const doc = await loader.load(file('report.pdf', 'pdf', new Uint8Array([1, 2, 3])));

		expect(doc.text).toBe('Hello world\nLine two\n\nPage two');
		expect(doc.metadata).toEqual({ pageCount: 2 });
		expect(doc.type).toBe('pdf');
		expect(pdfState.destroyed).toBe(1);
	});

	it('reports a corrupt file as a normalization failure', async () => {
		pdfState.error = new Error('Invalid PDF structure');

		const error = await loader.load(file('broken.pdf', 'pdf', new Uint8Array([0]))).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(NormalizationError);
		expect(error).toMatchObject({ code: ErrorCode.NORMALIZATION_FAILED, message: 'Failed to parse PDF broken.pdf' });
		expect(pdfState.destroyed).toBe(1);
	});

	it('rejects a scanned PDF without a text layer', async () => {
		pdfState.pages = [[], []];

		await expect(loader.load(file('scan.pdf', 'pdf', new Uint8Array([0]))))
			.rejects.toMatchObject({ code: ErrorCode.EMPTY_DOCUMENT });
	});
});

describe('DocxDocumentLoader', () => {
	const loader = new DocxDocumentLoader();

	beforeEach(() => {
		docxState.text = '';
		docxState.error = null;
	});

	it('extracts the raw text', async () => {
		docxState.text = 'Title\n\nBody text\n';

		const doc = await loader.load(file('memo.docx', 'docx', new Uint8Array([1])));

		expect(doc.text).toBe('Title\n\nBody text');
		expect(doc.displayName).toBe('memo.docx');
	});

	it('reports an unreadable file as a normalization failure', async () => {
		docxState.error = new Error('Could not find file in options');

		await expect(loader.load(file('memo.docx', 'docx', new Uint8Array([1]))))
			.rejects.toThrow('Failed to parse DOCX memo.docx');
	});
});

describe('collapsePageText', () => {
	it('trims lines and joins phrases with single spaces', () => {
		expect(collapsePageText('  a  b \n\n c   d ')).toBe('a b c d');
	});
});

describe('parseHttpUrl', () => {
	it('accepts http(s) URLs', () => {
		expect(parseHttpUrl(' https://example.com/a?b=1 ').href).toBe('https://example.com/a?b=1');
	});

	it.each(['not a url', 'ftp://example.com/file', 'file:///etc/hosts'])('rejects %s', url => {
		expect(() => parseHttpUrl(url)).toThrow(NormalizationError);
	});
});

describe('UrlDocumentLoader', () => {
	const loader = new UrlDocumentLoader(1000);

	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it('extracts the visible text and uses the title as display name', async () => {
		const fetchMock = vi.fn(async () => htmlResponse(
			'<html><head><title> Handbook </title><style>p { color: red; }</style></head>'
			+ '<body><h1>Refunds</h1>\n<p>Within  30 days.</p><noscript>Enable JS</noscript></body></html>',
		));
		vi.stubGlobal('fetch', fetchMock);

		const doc = await loader.load('https://example.com/handbook');

		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(doc).toMatchObject({
			type: 'url',
			origin: 'url',
			locator: 'https://example.com/handbook',
			displayName: 'Handbook',
			text: 'Refunds Within 30 days.',
			metadata: { title: 'Handbook' },
		});
	});

	it('falls back to the URL when the page has no title', async () => {
		vi.stubGlobal('fetch', vi.fn(async () => htmlResponse('<body><p>Plain page</p></body>')));

		const doc = await loader.load('https://example.com/plain');

		expect(doc.displayName).toBe('https://example.com/plain');
		expect(doc.metadata).toEqual({});
	});

	it('reports an HTTP error status', async () => {
		vi.stubGlobal('fetch', vi.fn(async () => htmlResponse('gone', 404)));

		const error = await loader.load('https://example.com/missing').catch((e: unknown) => e);

		expect(error).toBeInstanceOf(SourceFetchError);
		expect(error).toMatchObject({
			code: ErrorCode.SOURCE_FETCH_FAILED,
			status: 404,
			message: 'Failed to fetch https://example.com/missing: HTTP 404',
		});
	});

	it('reports a network failure', async () => {
		vi.stubGlobal('fetch', vi.fn(async () => {
			throw new TypeError('fetch failed');
		}));

		await expect(loader.load('https://example.com/down')).rejects.toMatchObject({
			code: ErrorCode.SOURCE_FETCH_FAILED,
			message: 'Failed to fetch https://example.com/down',
		});
	});

	it('rejects a page with no readable text', async () => {
		vi.stubGlobal('fetch', vi.fn(async () => htmlResponse('<body><script>render()</script></body>')));

		await expect(loader.load('https://example.com/app')).rejects.toMatchObject({ code: ErrorCode.EMPTY_DOCUMENT });
	});
});

describe('DocumentLoaderManager', () => {
	const manager = new DocumentLoaderManager({ maxUploadSize: 10, urlFetchTimeoutMs: 1000 });

	it('maps file extensions to document types', () => {
		expect(manager.getTypeForFileName('Report.PDF')).toBe('pdf');
		expect(manager.getTypeForFileName('memo.docx')).toBe('docx');
		expect(manager.getTypeForFileName('README')).toBeNull();
		expect(manager.getTypeForFileName('notes.md')).toBeNull();
	});

	it('rejects files over the size limit', async () => {
		await expect(manager.loadFile(file('big.txt', 'txt', 'x'.repeat(11)))).rejects.toMatchObject({
			code: ErrorCode.DOCUMENT_TOO_LARGE,
			message: 'File big.txt is 11 bytes, limit is 10 bytes',
		});
	});

	it('rejects a known extension that contradicts the declared type', async () => {
		await expect(manager.loadFile(file('memo.docx', 'txt', 'hello'))).rejects.toMatchObject({
			code: ErrorCode.UNSUPPORTED_DOCUMENT_TYPE,
			message: 'File memo.docx does not match declared type \'txt\'',
		});
	});

	it('accepts names without a known extension', async () => {
		expect((await manager.loadFile(file('README', 'txt', 'hello'))).text).toBe('hello');
		expect((await manager.loadFile(file('notes.md', 'txt', 'hi'))).text).toBe('hi');
	});
});
