/**
 * ============================================================================
 * Grounded answer prompt.
 * 基于检索上下文回答问题的提示词
 * ============================================================================
 *
 * 【输入变量】
 * - context: 拼装好的上下文块（必需），每块带有 [Source N: ...] 标注
 * - question: 用户问题（必需）
 *
 * 模型只能使用上下文中的信息作答；信息不足时需要明确说明。
 */
export const template = `You are a helpful assistant that answers questions based on the provided context.
Use only the information from the context to answer the question. If the context doesn't contain
enough information to answer the question, say so clearly.
When you use information from a block, mention its source label, e.g. [Source 1].

Context:
{{context}}

Question: {{question}}

Answer: `;
