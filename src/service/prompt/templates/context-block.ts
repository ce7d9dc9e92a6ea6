/**
 * One retrieved chunk inside the context, with its attribution marker.
 * 上下文中的单个检索块，带来源标注。
 *
 * 【输入变量】
 * - index: 在上下文中的序号（从 1 开始）
 * - displayName: 来源显示名称
 * - sequenceIndex / chunkCount: 分块在来源中的位置
 * - text: 分块文本
 */
export const template = `[Source {{index}}: {{displayName}} (chunk {{inc sequenceIndex}}/{{chunkCount}})]
{{text}}`;
