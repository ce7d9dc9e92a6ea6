import type { LLMProviderService } from '@/core/providers/types';
import { EmbeddingServiceError } from '@/core/errors';
import { isFiniteVector } from '@/core/utils/vector-utils';

export interface EmbeddingGatewayOptions {
	/** Embedding model id, e.g. 'all-minilm' */
	model: string;
	/** Texts per service call */
	batchSize: number;
}

/**
 * Embedding Gateway
 *
 * Maps texts to vectors through the configured provider: same length, same
 * order. Input is sent in order-preserving batches. There is no retry here;
 * callers decide their own retry policy.
 *
 * 嵌入网关：通过提供商把文本映射为向量，输出与输入等长且同序。
 * 大输入按批次发送；不做重试。
 */
export class EmbeddingGateway {
	constructor(
		private readonly provider: LLMProviderService,
		private readonly options: EmbeddingGatewayOptions,
	) { }

	getModel(): string {
		return this.options.model;
	}

	/**
	 * @throws EmbeddingServiceError when the service is unreachable or returns malformed output
	 */
	async embed(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		const vectors: number[][] = [];
		for (let i = 0; i < texts.length; i += this.options.batchSize) {
			const batch = texts.slice(i, i + this.options.batchSize);
			const embeddings = await this.embedBatch(batch);
			vectors.push(...embeddings);
		}

		const dimension = vectors[0].length;
		if (vectors.some(vector => vector.length !== dimension)) {
			throw new EmbeddingServiceError(`Embedding service returned vectors of inconsistent dimensions for model ${this.options.model}`);
		}
		return vectors;
	}

	private async embedBatch(batch: string[]): Promise<number[][]> {
		let embeddings: unknown;
		try {
			embeddings = await this.provider.generateEmbeddings(batch, this.options.model);
		} catch (error) {
			console.error('[EmbeddingGateway] Embedding request failed:', error);
			const reason = error instanceof Error ? error.message : String(error);
			throw new EmbeddingServiceError(`Embedding service unavailable: ${reason}`, error);
		}

		if (!Array.isArray(embeddings) || embeddings.length !== batch.length) {
			const count = Array.isArray(embeddings) ? embeddings.length : 0;
			throw new EmbeddingServiceError(`Embedding service returned ${count} vectors for ${batch.length} texts`);
		}
		const vectors: number[][] = [];
		for (const embedding of embeddings) {
			if (!isFiniteVector(embedding) || embedding.length === 0) {
				throw new EmbeddingServiceError('Embedding service returned an empty or non-numeric vector');
			}
			vectors.push(embedding);
		}
		return vectors;
	}
}
