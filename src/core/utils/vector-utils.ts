/**
 * @file vector-utils.ts
 * @description 向量工具函数：float32 BLOB 编解码与余弦相似度
 */

/**
 * Convert number[] to Buffer (BLOB format) for database storage.
 * 4 bytes per value, float32 little-endian.
 *
 * 将 number[] 转换为 Buffer (BLOB 格式) 以供数据库存储。
 */
export function encodeEmbedding(values: number[]): Buffer {
	const buffer = Buffer.allocUnsafe(values.length * 4);
	for (let i = 0; i < values.length; i++) {
		buffer.writeFloatLE(values[i], i * 4);
	}
	return buffer;
}

/**
 * Convert Buffer (BLOB format) from database to number[].
 * 将数据库中的 Buffer (BLOB 格式) 转换为 number[]。
 */
export function decodeEmbedding(buffer: Uint8Array): number[] {
	const view = Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength);
	const values: number[] = [];
	for (let i = 0; i + 4 <= view.length; i += 4) {
		values.push(view.readFloatLE(i));
	}
	return values;
}

export function vectorNorm(values: number[]): number {
	let sum = 0;
	for (let i = 0; i < values.length; i++) sum += values[i] * values[i];
	return Math.sqrt(sum);
}

/**
 * Cosine similarity of two vectors of the same length.
 * A zero vector on either side has similarity 0.
 *
 * 余弦相似度。任一向量为零向量时返回 0。
 *
 * @param queryNorm - Precomputed norm of `a`, when scoring many vectors against one query
 */
export function cosineSimilarity(a: number[], b: number[], queryNorm: number = vectorNorm(a)): number {
	let dot = 0;
	let normB = 0;
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i];
		normB += b[i] * b[i];
	}
	if (queryNorm === 0 || normB === 0) {
		return 0;
	}
	return dot / (queryNorm * Math.sqrt(normB));
}

/**
 * Whether every value is a finite number.
 */
export function isFiniteVector(values: unknown): values is number[] {
	return Array.isArray(values) && values.every(v => typeof v === 'number' && Number.isFinite(v));
}
