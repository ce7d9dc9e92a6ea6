import type { RagSettings } from '@/app/settings/types';
import { loadSettings, validateSettings } from '@/app/settings/SettingsLoader';
import { DocumentLoaderManager } from '@/core/document/loader/helper/DocumentLoaderManager';
import { KnowledgeBase } from '@/core/storage/KnowledgeBase';
import { ProviderServiceFactory } from '@/core/providers/base/factory';
import type { LLMProviderService } from '@/core/providers/types';
import { EmbeddingGateway } from '@/service/gateway/EmbeddingGateway';
import { GenerationGateway } from '@/service/gateway/GenerationGateway';
import { PromptService } from '@/service/prompt/PromptService';
import { Chunker } from '@/service/rag/Chunker';
import { Retriever } from '@/service/rag/Retriever';
import { PromptAssembler } from '@/service/rag/PromptAssembler';
import { RagOrchestrator } from '@/service/rag/RagOrchestrator';
import type { SourceStateListener } from '@/service/rag/types';

export interface RagApplicationInitOptions {
	/** Use these settings instead of loading them */
	settings?: RagSettings;
	/** JSON settings file read when `settings` is not given */
	settingsFile?: string;
	/** Environment used for overrides; defaults to process.env */
	env?: NodeJS.ProcessEnv;
	/** Provider registry; register in-process providers here */
	providerFactory?: ProviderServiceFactory;
	onSourceStateChange?: SourceStateListener;
	/** How many failed sources keep reporting 'failed' */
	failedStateLimit?: number;
}

/**
 * Application entry that wires the knowledge base, gateways and orchestrator.
 *
 * ```typescript
 * const app = await RagApplication.init({ settingsFile: './settings.json' });
 * await app.orchestrator.ingestUrl('https://example.com/handbook');
 * const { answer, citations } = await app.orchestrator.query('What is the refund policy?');
 * await app.shutdown();
 * ```
 */
export class RagApplication {
	private closed = false;

	private constructor(
		readonly settings: RagSettings,
		readonly knowledgeBase: KnowledgeBase,
		readonly provider: LLMProviderService,
		readonly orchestrator: RagOrchestrator,
	) { }

	/**
	 * Loads settings, opens the knowledge base and builds the pipeline.
	 */
	static async init(options: RagApplicationInitOptions = {}): Promise<RagApplication> {
		const settings = options.settings
			? validateSettings(options.settings)
			: await loadSettings({ settingsFile: options.settingsFile, env: options.env });

		const providers = options.providerFactory ?? new ProviderServiceFactory();
		const ai = settings.ai;
		const provider = providers.create(ai.provider, ai.llmProviderConfigs[ai.provider] ?? {});

		const knowledgeBase = await KnowledgeBase.open({ storageFolder: settings.dataStorageFolder });

		const embeddings = new EmbeddingGateway(provider, {
			model: ai.embeddingModel,
			batchSize: ai.embeddingBatchSize,
		});
		const generation = new GenerationGateway(provider, {
			model: ai.generationModel,
			outputControl: ai.defaultOutputControl,
		});

		const orchestrator = new RagOrchestrator({
			knowledgeBase,
			loaders: new DocumentLoaderManager(settings.ingestion),
			chunker: new Chunker(),
			embeddings,
			retriever: new Retriever(knowledgeBase, embeddings),
			assembler: new PromptAssembler(new PromptService()),
			generation,
			provider,
			chunking: settings.chunking,
			retrieval: settings.retrieval,
			onSourceStateChange: options.onSourceStateChange,
			failedStateLimit: options.failedStateLimit,
		});

		console.log(`[RagApplication] Ready: provider=${ai.provider}, generation=${ai.generationModel}, embedding=${ai.embeddingModel}, store=${knowledgeBase.location()}`);
		return new RagApplication(settings, knowledgeBase, provider, orchestrator);
	}

	/**
	 * Closes the knowledge base. Safe to call more than once.
	 */
	async shutdown(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		await this.knowledgeBase.close();
		console.log('[RagApplication] Shut down');
	}
}

export default RagApplication;
