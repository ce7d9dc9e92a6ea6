/**
 * Prompt used when retrieval found nothing. The caller marks the answer as ungrounded.
 * 检索不到任何内容时使用的提示词，答案会被标记为未使用来源。
 */
export const template = `You are a helpful assistant. No documents from the knowledge base were available for this question,
so answer from general knowledge and say that no sources were used.

Question: {{question}}

Answer: `;
