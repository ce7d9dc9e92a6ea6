/**
 * @file GenerationGateway.ts
 * @description 生成网关：对提供商的阻塞 / 流式生成做统一封装与错误转换。
 *
 * 流式生成返回一个可取消的惰性序列：调用方随时可以停止拉取（break / return()），
 * 网关会通过 AbortController 中断底层 SDK 请求并关闭提供商的流。
 */

import type { LLMOutputControlSettings, LLMProviderService, LLMRequest } from '@/core/providers/types';
import { GenerationServiceError } from '@/core/errors';

export interface GenerationGatewayOptions {
	/** Generation model id, e.g. 'gemma3:1b' */
	model: string;
	outputControl?: LLMOutputControlSettings;
}

export type GenerationStreamEvent =
	| { type: 'fragment'; text: string }
	| { type: 'end' };

export class GenerationGateway {
	constructor(
		private readonly provider: LLMProviderService,
		private readonly options: GenerationGatewayOptions,
	) { }

	getModel(): string {
		return this.options.model;
	}

	/**
	 * Complete answer for a prompt.
	 * @throws GenerationServiceError when the service is unreachable or returns malformed output
	 */
	async generate(prompt: string, options: { signal?: AbortSignal } = {}): Promise<string> {
		let text: unknown;
		try {
			const response = await this.provider.blockChat(this.buildRequest(prompt, options.signal));
			text = response.text;
		} catch (error) {
			console.error('[GenerationGateway] Generation request failed:', error);
			throw toGenerationError(error);
		}
		if (typeof text !== 'string') {
			throw new GenerationServiceError('Generation service returned a non-text answer');
		}
		return text;
	}

	/**
	 * Answer as a stream of fragments followed by one `end` event.
	 * Fragments concatenated equal the complete answer.
	 *
	 * 以文本片段流的形式返回答案，最后是一个 `end` 事件。
	 */
	async *generateStream(prompt: string, options: { signal?: AbortSignal } = {}): AsyncGenerator<GenerationStreamEvent> {
		const controller = new AbortController();
		const onExternalAbort = () => controller.abort(options.signal?.reason);
		if (options.signal?.aborted) {
			controller.abort(options.signal.reason);
		} else {
			options.signal?.addEventListener('abort', onExternalAbort, { once: true });
		}

		let finished = false;
		try {
			for await (const event of this.provider.streamChat(this.buildRequest(prompt, controller.signal))) {
				switch (event.type) {
					case 'text-delta':
						if (event.text) {
							yield { type: 'fragment', text: event.text };
						}
						break;
					case 'complete':
						finished = true;
						yield { type: 'end' };
						return;
					case 'error':
						finished = true;
						throw new GenerationServiceError(`Generation service error: ${event.error.message}`, event.error);
				}
			}
			finished = true;
			yield { type: 'end' };
		} catch (error) {
			if (error instanceof GenerationServiceError) {
				throw error;
			}
			console.error('[GenerationGateway] Generation stream failed:', error);
			throw toGenerationError(error);
		} finally {
			options.signal?.removeEventListener('abort', onExternalAbort);
			if (!finished) {
				// consumer stopped pulling: release the underlying request
				console.debug('[GenerationGateway] Stream closed early, aborting generation');
				controller.abort();
			}
		}
	}

	private buildRequest(prompt: string, abortSignal?: AbortSignal): LLMRequest {
		return {
			provider: this.provider.getProviderId(),
			model: this.options.model,
			prompt,
			outputControl: this.options.outputControl,
			abortSignal,
		};
	}
}

function toGenerationError(error: unknown): GenerationServiceError {
	if (error instanceof GenerationServiceError) {
		return error;
	}
	const reason = error instanceof Error ? error.message : String(error);
	return new GenerationServiceError(`Generation service unavailable: ${reason}`, error);
}
