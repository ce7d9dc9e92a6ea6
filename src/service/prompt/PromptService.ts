/**
 * ============================================================================
 * 文件说明: PromptService.ts - 提示词服务
 * ============================================================================
 *
 * 负责把注册表中的 Handlebars 模板渲染成发给模型的文本。
 *
 * - 模板定义在代码中（templates/*.ts），通过 PromptId 查找
 * - 变量类型由 PromptVariables 约束
 * - 编译后的模板会被缓存
 * - 渲染不做 HTML 转义：提示词是纯文本，文档内容需要原样进入上下文
 *
 * ```typescript
 * const prompt = promptService.render(PromptId.RagGrounded, {
 *   context: '[Source 1: notes.txt (chunk 1/3)]\n...',
 *   question: 'What is the refund policy?',
 * });
 * ```
 * ============================================================================
 */

import Handlebars from 'handlebars';
import { PromptId, type PromptVariables, PROMPT_REGISTRY } from './PromptId';
import { registerTemplateEngineHelpers } from '@/core/template-engine-helper';

type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

/**
 * Renders code-first prompt templates.
 * 提示词模板渲染服务。
 */
export class PromptService {
	private readonly templateCache = new Map<PromptId, CompiledTemplate>();

	constructor() {
		registerTemplateEngineHelpers();
	}

	/**
	 * Render a prompt with variables using Handlebars.
	 * Missing variables are an error, not an empty string.
	 */
	render<K extends PromptId>(id: K, variables: PromptVariables[K]): string {
		return this.getCompiled(id)(variables);
	}

	private getCompiled(id: PromptId): CompiledTemplate {
		const cached = this.templateCache.get(id);
		if (cached) {
			return cached;
		}
		const template = PROMPT_REGISTRY[id];
		if (!template) {
			throw new Error(`Prompt template not found: ${id}`);
		}
		const compiled = Handlebars.compile(template.template, { noEscape: true, strict: true });
		this.templateCache.set(id, compiled);
		return compiled;
	}
}
