/**
 * @file id-utils.ts
 * @description ID 生成工具函数，提供稳定来源 ID 和分块 ID 的生成功能
 */

import { hashMD5 } from './hash-utils';

/**
 * Generate a stable UUID from a string (deterministic).
 * Same input always produces the same UUID.
 *
 * 从字符串生成稳定的 UUID（确定性的）
 * 相同的输入总是产生相同的 UUID
 *
 * @returns A 32-character hex string
 */
export function generateStableUuid(input: string): string {
	return hashMD5(input);
}

/**
 * Stable source id for an origin and its locator (file name or URL).
 * Re-ingesting the same file name or URL targets the same source.
 *
 * 根据来源类型与定位符（文件名或 URL）生成稳定的来源 ID。
 */
export function buildSourceId(origin: 'file' | 'url', locator: string): string {
	return generateStableUuid(`${origin}:${locator}`);
}

/**
 * Chunk id derived from the owning source and the chunk's sequence index.
 *
 * 分块 ID：来源 ID + 序号。
 */
export function buildChunkId(sourceId: string, sequenceIndex: number): string {
	return `${sourceId}:${sequenceIndex}`;
}
