/**
 * ============================================================================
 * 文件说明: PromptId.ts - 提示词标识符与注册表
 * ============================================================================
 *
 * 集中管理所有提示词的 ID、模板内容和变量类型。
 *
 * 添加新提示词：
 * 1. 在 templates/ 下创建模板文件，导出 `template`
 * 2. 在 PromptId 枚举中添加 ID
 * 3. 在 PromptVariables 中声明变量类型
 * 4. 在 PROMPT_REGISTRY 中注册
 *
 * ```typescript
 * promptService.render(PromptId.RagGrounded, { context, question });
 * ```
 * ============================================================================
 */

import * as ragGrounded from './templates/rag-grounded';
import * as ragUngrounded from './templates/rag-ungrounded';
import * as contextBlock from './templates/context-block';

/**
 * Prompt template definition.
 */
export interface PromptTemplate {
	/** Template text with {{variable}} placeholders */
	template: string;
}

function createTemplate(module: { template: string }): PromptTemplate {
	return { template: module.template };
}

/**
 * Centralized prompt identifier enum.
 */
export enum PromptId {
	// Answer prompts
	RagGrounded = 'rag-grounded',
	RagUngrounded = 'rag-ungrounded',

	// Context building templates (internal use)
	ContextBlock = 'context-block',
}

/**
 * Variable schemas for each prompt type.
 * Used for type-safe rendering.
 */
export interface PromptVariables {
	[PromptId.RagGrounded]: {
		context: string;
		question: string;
	};
	[PromptId.RagUngrounded]: {
		question: string;
	};
	[PromptId.ContextBlock]: {
		index: number;
		displayName: string;
		sequenceIndex: number;
		chunkCount: number;
		text: string;
	};
}

/**
 * Central prompt registry.
 */
export const PROMPT_REGISTRY: Record<PromptId, PromptTemplate> = {
	[PromptId.RagGrounded]: createTemplate(ragGrounded),
	[PromptId.RagUngrounded]: createTemplate(ragUngrounded),
	[PromptId.ContextBlock]: createTemplate(contextBlock),
};
