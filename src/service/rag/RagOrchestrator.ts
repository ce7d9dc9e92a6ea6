/**
 * @file RagOrchestrator.ts
 * @description 检索增强问答编排器：导入（归一化 → 分块 → 嵌入 → 写入索引）与问答（检索 → 拼装 → 生成）。
 *
 * ## 来源状态机
 * absent → ingesting → ready | failed；删除时 ready → absent；失败的来源可以重新导入。
 * 新版本在嵌入完成后通过 replace 一次性写入：导入失败不会留下任何分块，
 * 已有的旧版本保持可读（状态回到 ready，事件中带上错误）。
 * 同一来源的导入与删除通过 KeyedLock 串行执行，不同来源互不影响。
 * 失败状态只保留最近 failedStateLimit 个来源。
 *
 * ## 问答
 * 无状态：检索 → 拼装 → 生成。引用只来自拼装后实际进入上下文的结果。
 */

import type { FileInput, NormalizedDocument } from '@/core/document/types';
import type { DocumentLoaderManager } from '@/core/document/loader/helper/DocumentLoaderManager';
import { parseHttpUrl } from '@/core/document/loader/UrlDocumentLoader';
import type { KnowledgeBase } from '@/core/storage/KnowledgeBase';
import type { EmbeddedChunk, SourceDescriptor } from '@/core/storage/types';
import type { LLMProviderService } from '@/core/providers/types';
import type { ChunkingSettings, RetrievalSettings } from '@/app/settings/types';
import type { EmbeddingGateway } from '@/service/gateway/EmbeddingGateway';
import type { GenerationGateway } from '@/service/gateway/GenerationGateway';
import type { Chunker } from './Chunker';
import type { Retriever } from './Retriever';
import type { PromptAssembler } from './PromptAssembler';
import type {
	AssembledPrompt,
	Citation,
	QueryOptions,
	QueryResult,
	QueryStreamEvent,
	RetrievalResult,
	SourceState,
	SourceStateListener,
	StreamQueryOptions,
	SystemStatus,
} from './types';
import { ConfigurationError, NotFoundError } from '@/core/errors';
import { CONTEXT_PREVIEW_LENGTH, MAX_FAILED_SOURCE_STATES, NO_SOURCES_MARKER, SCORE_DECIMALS } from '@/core/constant';
import { buildSourceId } from '@/core/utils/id-utils';
import { previewText, roundScore } from '@/core/utils/format-utils';
import { KeyedLock } from '@/core/utils/KeyedLock';
import { Stopwatch } from '@/core/utils/Stopwatch';

/**
 * Prefix put in front of answers generated without retrieved context.
 */
const UNGROUNDED_PREFIX = `${NO_SOURCES_MARKER} `;

export interface RagOrchestratorOptions {
	knowledgeBase: KnowledgeBase;
	loaders: DocumentLoaderManager;
	chunker: Chunker;
	embeddings: EmbeddingGateway;
	retriever: Retriever;
	assembler: PromptAssembler;
	generation: GenerationGateway;
	/** Used for the model availability check */
	provider: LLMProviderService;
	chunking: ChunkingSettings;
	retrieval: RetrievalSettings;
	onSourceStateChange?: SourceStateListener;
	/** How many failed sources keep reporting 'failed'; older ones read as 'absent' */
	failedStateLimit?: number;
}

type PreparedQuery = {
	assembled: AssembledPrompt;
	includeSources: boolean;
};

export class RagOrchestrator {
	private readonly lock = new KeyedLock();
	/** Ready sources live in the knowledge base; these two hold the rest */
	private readonly ingesting = new Set<string>();
	/** Insertion ordered, oldest first */
	private readonly failed = new Set<string>();

	constructor(private readonly options: RagOrchestratorOptions) { }

	// ---------------------------------------------------------------------------
	// Ingestion
	// ---------------------------------------------------------------------------

	/**
	 * Ingest an uploaded file. Re-ingesting the same file name replaces the source.
	 *
	 * @throws NormalizationError for unsupported, too large, corrupt or empty files
	 */
	async ingestFile(input: FileInput): Promise<SourceDescriptor> {
		const sourceId = buildSourceId('file', input.name);
		return await this.lock.run(sourceId, () =>
			this.ingest(sourceId, input.name, () => this.options.loaders.loadFile(input)),
		);
	}

	/**
	 * Fetch and ingest a web page. Re-ingesting the same URL replaces the source.
	 *
	 * @throws SourceFetchError when the page cannot be fetched
	 * @throws NormalizationError for invalid URLs or pages without text
	 */
	async ingestUrl(url: string): Promise<SourceDescriptor> {
		const locator = parseHttpUrl(url).href;
		const sourceId = buildSourceId('url', locator);
		return await this.lock.run(sourceId, () =>
			this.ingest(sourceId, locator, () => this.options.loaders.loadUrl(locator)),
		);
	}

	/**
	 * Runs inside the source's critical section.
	 */
	private async ingest(
		sourceId: string,
		displayName: string,
		load: () => Promise<NormalizedDocument>,
	): Promise<SourceDescriptor> {
		const { knowledgeBase, chunker, embeddings, chunking } = this.options;
		const stopwatch = new Stopwatch(`RagOrchestrator ingest ${displayName}`);

		const from = await this.getSourceState(sourceId);
		this.failed.delete(sourceId);
		this.ingesting.add(sourceId);
		this.emit(sourceId, displayName, from, 'ingesting');
		try {
			stopwatch.start('normalize');
			const doc = await load();

			stopwatch.start('chunk');
			const chunks = Array.from(chunker.chunk(doc.text, sourceId, chunking.chunkSize, chunking.chunkOverlap));

			stopwatch.start('embed');
			const vectors = await embeddings.embed(chunks.map(chunk => chunk.text));

			stopwatch.start('index');
			const embedded: EmbeddedChunk[] = chunks.map((chunk, i) => ({ ...chunk, embedding: vectors[i] }));
			// the previous version stays readable until this commits
			const descriptor = await knowledgeBase.replace({
				id: sourceId,
				origin: doc.origin,
				locator: doc.locator,
				displayName: doc.displayName,
				docType: doc.type,
				contentHash: doc.contentHash,
				charCount: Array.from(doc.text).length,
				embeddingModel: embeddings.getModel(),
				ingestedAt: Date.now(),
				metadata: doc.metadata,
			}, embedded);
			stopwatch.stop();

			this.ingesting.delete(sourceId);
			this.emit(sourceId, descriptor.displayName, 'ingesting', 'ready');
			console.log(`[RagOrchestrator] Ingested ${descriptor.displayName}: ${descriptor.chunkCount} chunk(s)`);
			stopwatch.print();
			return descriptor;
		} catch (error) {
			stopwatch.stop();
			console.error(`[RagOrchestrator] Ingestion of ${displayName} failed:`, error);
			this.ingesting.delete(sourceId);
			if (await this.hasStoredVersion(sourceId)) {
				this.emit(sourceId, displayName, 'ingesting', 'ready', error);
			} else {
				this.rememberFailure(sourceId);
				this.emit(sourceId, displayName, 'ingesting', 'failed', error);
			}
			throw error;
		}
	}

	/**
	 * Whether a previous version survived a failed ingestion. A lookup failure is
	 * logged and counts as no; the ingestion error is the one reported to the caller.
	 */
	private async hasStoredVersion(sourceId: string): Promise<boolean> {
		try {
			return (await this.options.knowledgeBase.getSource(sourceId)) !== undefined;
		} catch (lookupError) {
			console.error(`[RagOrchestrator] Lookup of source ${sourceId} after failed ingestion failed:`, lookupError);
			return false;
		}
	}

	private rememberFailure(sourceId: string): void {
		const limit = this.options.failedStateLimit ?? MAX_FAILED_SOURCE_STATES;
		this.failed.add(sourceId);
		for (const oldest of this.failed) {
			if (this.failed.size <= limit) break;
			this.failed.delete(oldest);
		}
	}

	// ---------------------------------------------------------------------------
	// Knowledge base management
	// ---------------------------------------------------------------------------

	async listKnowledgeBase(): Promise<SourceDescriptor[]> {
		return await this.options.knowledgeBase.listSources();
	}

	/**
	 * @throws NotFoundError when the source does not exist
	 */
	async getSource(sourceId: string): Promise<SourceDescriptor> {
		const source = await this.options.knowledgeBase.getSource(sourceId);
		if (!source) {
			throw new NotFoundError(sourceId);
		}
		return source;
	}

	/**
	 * Current lifecycle state of a source.
	 */
	async getSourceState(sourceId: string): Promise<SourceState> {
		if (this.ingesting.has(sourceId)) {
			return 'ingesting';
		}
		if (this.failed.has(sourceId)) {
			return 'failed';
		}
		return (await this.options.knowledgeBase.getSource(sourceId)) ? 'ready' : 'absent';
	}

	/**
	 * Delete a source and its chunks. Deleting an absent source is a no-op.
	 */
	async deleteSource(sourceId: string): Promise<{ deleted: boolean }> {
		return await this.lock.run(sourceId, async () => {
			const source = await this.options.knowledgeBase.getSource(sourceId);
			const deleted = await this.options.knowledgeBase.deleteBySource(sourceId);
			const wasFailed = this.failed.delete(sourceId);
			if (deleted && source) {
				this.emit(sourceId, source.displayName, 'ready', 'absent');
			} else if (wasFailed) {
				this.emit(sourceId, sourceId, 'failed', 'absent');
			}
			return { deleted };
		});
	}

	/**
	 * Remove every source.
	 */
	async clearKnowledgeBase(): Promise<{ removedSources: number }> {
		const removed = await this.options.knowledgeBase.clearSources();
		for (const source of removed) {
			this.emit(source.id, source.displayName, 'ready', 'absent');
		}
		this.failed.clear();
		return { removedSources: removed.length };
	}

	// ---------------------------------------------------------------------------
	// Query
	// ---------------------------------------------------------------------------

	/**
	 * Answer a question from the knowledge base.
	 *
	 * @throws NotFoundError when `sourceIds` names an absent source
	 * @throws EmbeddingServiceError | GenerationServiceError when a service is unavailable
	 */
	async query(question: string, options: QueryOptions = {}): Promise<QueryResult> {
		const { assembled, includeSources } = await this.prepareQuery(question, options);
		const answer = await this.options.generation.generate(assembled.prompt);

		return {
			answer: assembled.grounded ? answer : UNGROUNDED_PREFIX + answer,
			citations: includeSources ? buildCitations(assembled.usedResults) : [],
			grounded: assembled.grounded,
			contextPreview: previewText(assembled.context, CONTEXT_PREVIEW_LENGTH),
		};
	}

	/**
	 * Streaming variant of `query`: fragments, then citations, then end.
	 * Stopping iteration early cancels the generation.
	 */
	async *queryStream(question: string, options: StreamQueryOptions = {}): AsyncGenerator<QueryStreamEvent> {
		const { assembled, includeSources } = await this.prepareQuery(question, options);

		if (!assembled.grounded) {
			yield { type: 'fragment', text: UNGROUNDED_PREFIX };
		}
		for await (const event of this.options.generation.generateStream(assembled.prompt, { signal: options.signal })) {
			if (event.type === 'end') break;
			yield event;
		}

		yield {
			type: 'citations',
			citations: includeSources ? buildCitations(assembled.usedResults) : [],
			grounded: assembled.grounded,
			contextPreview: previewText(assembled.context, CONTEXT_PREVIEW_LENGTH),
		};
		yield { type: 'end' };
	}

	private async prepareQuery(question: string, options: QueryOptions): Promise<PreparedQuery> {
		const { retrieval, retriever, assembler, knowledgeBase } = this.options;
		const topK = options.topK ?? retrieval.topK;
		if (!Number.isInteger(topK) || topK <= 0) {
			throw new ConfigurationError(`topK must be a positive integer, got ${topK}`);
		}

		if (options.sourceIds) {
			for (const sourceId of options.sourceIds) {
				if (!(await knowledgeBase.getSource(sourceId))) {
					throw new NotFoundError(sourceId);
				}
			}
		}

		const results = await retriever.retrieve(question, topK, { sourceIds: options.sourceIds });
		const assembled = assembler.assemble(question, results, retrieval.maxContextLength);
		return { assembled, includeSources: options.includeSources ?? true };
	}

	// ---------------------------------------------------------------------------
	// Status
	// ---------------------------------------------------------------------------

	/**
	 * Generation model availability and knowledge base summary.
	 * An unreachable provider is reported in the status, not thrown.
	 */
	async checkSystemStatus(): Promise<SystemStatus> {
		const { provider, generation, embeddings, knowledgeBase } = this.options;
		const generationModel = generation.getModel();

		let modelAvailable = false;
		let providerError: string | undefined;
		try {
			const models = await provider.getAvailableModels();
			modelAvailable = models.some(model => model.id === generationModel || model.id === `${generationModel}:latest`);
		} catch (error) {
			providerError = error instanceof Error ? error.message : String(error);
			console.warn('[RagOrchestrator] Provider unreachable while checking status:', error);
		}

		const stats = await knowledgeBase.stats();
		const sources = await knowledgeBase.listSources();
		return {
			provider: provider.getProviderId(),
			generationModel,
			modelAvailable,
			...(providerError !== undefined ? { providerError } : {}),
			embeddingModel: embeddings.getModel(),
			storagePath: knowledgeBase.location(),
			knowledgeBase: {
				totalSources: stats.totalSources,
				totalChunks: stats.totalChunks,
				sources,
			},
		};
	}

	// ---------------------------------------------------------------------------
	// State
	// ---------------------------------------------------------------------------

	private emit(sourceId: string, displayName: string, from: SourceState, to: SourceState, error?: unknown): void {
		console.debug(`[RagOrchestrator] Source ${sourceId} (${displayName}): ${from} -> ${to}`);
		this.options.onSourceStateChange?.({
			sourceId,
			displayName,
			from,
			to,
			...(error !== undefined ? { error } : {}),
		});
	}
}

/**
 * One citation per source in rank order, scored by its best used chunk.
 * 每个来源一条引用，按排名顺序，分数取该来源最佳分块的分数。
 */
export function buildCitations(results: RetrievalResult[]): Citation[] {
	const citations: Citation[] = [];
	const seen = new Set<string>();
	for (const result of results) {
		if (seen.has(result.source.id)) continue;
		seen.add(result.source.id);
		citations.push({
			sourceId: result.source.id,
			displayName: result.source.displayName,
			score: roundScore(result.score, SCORE_DECIMALS),
			chunkLabel: `Chunk ${result.chunk.sequenceIndex + 1} of ${result.source.chunkCount}`,
		});
	}
	return citations;
}
