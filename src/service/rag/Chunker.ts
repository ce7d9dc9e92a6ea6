import type { Chunk } from './types';
import { ConfigurationError } from '@/core/errors';
import { buildChunkId } from '@/core/utils/id-utils';

/**
 * Splits normalized text into fixed windows of `chunkSize` characters whose
 * starts advance by `chunkSize - overlap`. The window that reaches the end of
 * the text is the last one, so no chunk consists of overlap only.
 *
 * Characters are Unicode code points: a surrogate pair is never split.
 *
 * 将归一化文本按固定窗口切分：窗口长度 chunkSize，起点每次前进 chunkSize - overlap。
 * 覆盖到文本末尾的窗口即为最后一个窗口。字符按 Unicode 码点计算。
 */
export class Chunker {
	/**
	 * Lazy, restartable sequence of chunks. Each iteration starts from the
	 * beginning; nothing is shared between iterations.
	 *
	 * 返回惰性、可重复迭代的分块序列。
	 *
	 * @throws ConfigurationError when `0 <= overlap < chunkSize` does not hold
	 */
	chunk(text: string, sourceId: string, chunkSize: number, overlap: number): Iterable<Chunk> {
		validateChunkParams(chunkSize, overlap);
		return {
			[Symbol.iterator]: () => generateWindows(text, sourceId, chunkSize, overlap),
		};
	}
}

export function validateChunkParams(chunkSize: number, overlap: number): void {
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
	}
	if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
		throw new ConfigurationError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${overlap}`);
	}
}

function* generateWindows(text: string, sourceId: string, chunkSize: number, overlap: number): Generator<Chunk> {
	const chars = Array.from(text);
	const stride = chunkSize - overlap;
	let sequenceIndex = 0;

	for (let start = 0; start < chars.length; start += stride) {
		const end = Math.min(start + chunkSize, chars.length);
		yield {
			id: buildChunkId(sourceId, sequenceIndex),
			sourceId,
			sequenceIndex,
			text: chars.slice(start, end).join(''),
			startOffset: start,
			endOffset: end,
		};
		sequenceIndex++;
		if (end === chars.length) return;
	}
}
