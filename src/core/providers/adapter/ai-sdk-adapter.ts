/**
 * @file ai-sdk-adapter.ts
 * @description AI SDK 适配层。
 *
 * 将内部的 `LLMRequest` 数据结构转换为 Vercel AI SDK (npm: ai) 所能理解的格式，并统一处理生成结果。
 *
 * 主要功能：
 * 1. `blockChat`: 执行阻塞对话，等待模型生成完整结果后返回。
 * 2. `streamChat`: 执行流式对话，将模型输出转换为文本增量(text-delta)、完成(complete)、错误(error)事件。
 *
 * SDK 的自动重试被关闭（maxRetries: 0），重试策略由调用方决定。
 */

import {
	type LanguageModel,
	streamText,
	generateText,
} from 'ai';
import type { LLMRequest, LLMResponse, LLMStreamEvent } from '../types';

/**
 * 【内部工具】将 LLMRequest 转换为 AI SDK 调用参数
 *
 * - 系统提示词与单轮 prompt
 * - 采样参数（Temperature, TopP, MaxTokens）
 * - 中断信号 (AbortSignal)，用于调用方取消生成
 */
function buildAiSdkParams(model: LanguageModel, request: LLMRequest) {
	return {
		model,
		system: request.system,
		prompt: request.prompt,
		maxOutputTokens: request.outputControl?.maxOutputTokens,
		temperature: request.outputControl?.temperature,
		topP: request.outputControl?.topP,
		abortSignal: request.abortSignal,
		maxRetries: 0,
	};
}

/**
 * 执行阻塞式对话
 * 模型完全生成完毕后才返回结果。
 */
export async function blockChat(
	model: LanguageModel,
	request: LLMRequest
): Promise<LLMResponse> {
	try {
		const result = await generateText(buildAiSdkParams(model, request));
		return {
			text: result.text,
			finishReason: result.finishReason,
			usage: result.usage,
		};
	} catch (error) {
		console.error('[ai-sdk-adapter] Block chat error:', error);
		throw error;
	}
}

/**
 * 执行流式对话（异步生成器）
 * 遍历 `fullStream`，通过 switch-case 将文本类 chunk 转换为 `LLMStreamEvent`。
 * 调用方提前停止迭代时，`for await` 会关闭底层流。
 */
export async function* streamChat(
	model: LanguageModel,
	request: LLMRequest
): AsyncGenerator<LLMStreamEvent> {
	const startTime = Date.now();
	try {
		const result = streamText(buildAiSdkParams(model, request));

		for await (const chunk of result.fullStream) {
			switch (chunk.type) {
				case 'text-delta':
					yield { type: 'text-delta', text: chunk.text };
					break;
				case 'finish':
					yield { type: 'complete', usage: chunk.totalUsage, durationMs: Date.now() - startTime };
					return;
				case 'error': {
					console.error('[ai-sdk-adapter] Stream chat chunk error:', chunk.error);
					yield {
						type: 'error',
						error: chunk.error instanceof Error ? chunk.error : new Error(String(chunk.error)),
						durationMs: Date.now() - startTime,
					};
					return;
				}
				case 'abort':
					yield { type: 'error', error: new Error('Generation aborted'), durationMs: Date.now() - startTime };
					return;
				default:
					// reasoning, step and tool chunks carry no answer text
					break;
			}
		}

		yield { type: 'complete', durationMs: Date.now() - startTime };
	} catch (error) {
		console.error('[ai-sdk-adapter] Stream chat exception error:', error);
		yield {
			type: 'error',
			error: error instanceof Error ? error : new Error(String(error)),
			durationMs: Date.now() - startTime,
		};
	}
}
