/**
 * @file hash-utils.ts
 * @description 哈希工具函数，用于生成内容指纹
 *
 * Hash utility functions for content fingerprinting.
 *
 * 注意：用于去重和内容指纹，不用于安全用途
 * Note: These are used for deduplication and fingerprints, not for security.
 */
import { createHash } from 'crypto';

/**
 * MD5 hex digest of a string.
 *
 * @returns Hex string representation of the MD5 hash (32 characters)
 */
export function hashMD5(str: string): string {
	return createHash('md5').update(str).digest('hex');
}
