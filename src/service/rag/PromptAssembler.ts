/**
 * @file PromptAssembler.ts
 * @description 提示词拼装：把检索结果按排名拼成带来源标注的上下文，并套用问答模板。
 *
 * 上下文超出 maxContextLength 时从排名最低的结果开始丢弃；
 * 如果排名第一的结果单独就超出预算，则截断其文本，保证最佳结果总被保留。
 * 没有任何结果时使用无来源模板。
 */

import type { AssembledPrompt, RetrievalResult } from './types';
import { PromptId } from '@/service/prompt/PromptId';
import type { PromptService } from '@/service/prompt/PromptService';
import { CONTEXT_BLOCK_SEPARATOR } from '@/core/constant';
import { ConfigurationError } from '@/core/errors';

export class PromptAssembler {
	constructor(private readonly prompts: PromptService) { }

	assemble(queryText: string, results: RetrievalResult[], maxContextLength: number): AssembledPrompt {
		if (!Number.isFinite(maxContextLength) || maxContextLength <= 0) {
			throw new ConfigurationError(`maxContextLength must be positive, got ${maxContextLength}`);
		}

		if (results.length === 0) {
			return {
				prompt: this.prompts.render(PromptId.RagUngrounded, { question: queryText }),
				usedResults: [],
				grounded: false,
				context: '',
			};
		}

		const blocks = results.map((result, i) => this.prompts.render(PromptId.ContextBlock, {
			index: i + 1,
			displayName: result.source.displayName,
			sequenceIndex: result.chunk.sequenceIndex,
			chunkCount: result.source.chunkCount,
			text: result.chunk.text,
		}));

		const kept = fitBlocks(blocks, maxContextLength);
		if (kept.length < results.length) {
			console.debug(`[PromptAssembler] Dropped ${results.length - kept.length} of ${results.length} result(s) to fit ${maxContextLength} chars`);
		}

		const context = kept.join(CONTEXT_BLOCK_SEPARATOR);
		return {
			prompt: this.prompts.render(PromptId.RagGrounded, { context, question: queryText }),
			usedResults: results.slice(0, kept.length),
			grounded: true,
			context,
		};
	}
}

/**
 * Longest rank prefix of `blocks` whose joined length fits `budget`.
 * The first block is always kept, clipped to the budget when needed.
 */
function fitBlocks(blocks: string[], budget: number): string[] {
	const first = Array.from(blocks[0]);
	const kept = [first.length > budget ? first.slice(0, budget).join('') : blocks[0]];
	let length = Math.min(first.length, budget);

	for (let i = 1; i < blocks.length; i++) {
		const next = length + CONTEXT_BLOCK_SEPARATOR.length + Array.from(blocks[i]).length;
		if (next > budget) break;
		kept.push(blocks[i]);
		length = next;
	}
	return kept;
}
