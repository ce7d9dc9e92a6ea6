import type { KnowledgeBase } from '@/core/storage/KnowledgeBase';
import type { EmbeddingGateway } from '@/service/gateway/EmbeddingGateway';
import type { RetrievalResult, RetrieveOptions } from './types';

/**
 * Embeds the query and searches the knowledge base. Never mutates the index.
 *
 * 检索器：嵌入查询文本后在知识库中检索，不修改索引。
 */
export class Retriever {
	constructor(
		private readonly knowledgeBase: KnowledgeBase,
		private readonly embeddings: EmbeddingGateway,
	) { }

	/**
	 * Up to `topK` results, best first. A blank query returns nothing without
	 * calling the embedding service.
	 */
	async retrieve(queryText: string, topK: number, options: RetrieveOptions = {}): Promise<RetrievalResult[]> {
		if (!queryText.trim()) {
			return [];
		}
		const [queryVector] = await this.embeddings.embed([queryText]);
		const results = await this.knowledgeBase.search(queryVector, topK, { sourceIds: options.sourceIds });
		console.debug(`[Retriever] ${results.length} result(s) for query (topK=${topK})`);
		return results;
	}
}
