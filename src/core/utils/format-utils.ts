/**
 * @file format-utils.ts
 * @description 格式化工具函数，提供数字、时间、文本等的格式化功能
 */

/**
 * Format duration in milliseconds to human-readable string
 * @returns Formatted string (e.g., "123ms", "8.1s", "2.5m")
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) {
		return `${Math.round(ms)}ms`;
	}
	if (ms < 60000) {
		return `${(ms / 1000).toFixed(1)}s`;
	}
	return `${(ms / 60000).toFixed(1)}m`;
}

export function trimTrailingSlash(url: string): string {
	return url.endsWith('/') ? url.slice(0, -1) : url;
}

/**
 * Round a similarity score for display.
 * 将相似度分数保留指定位数小数。
 */
export function roundScore(score: number, decimals: number): number {
	const factor = 10 ** decimals;
	return Math.round(score * factor) / factor;
}

/**
 * First `maxLength` characters of a text, followed by "..." when it was cut.
 * 截取文本前若干字符，被截断时追加 "..."。
 */
export function previewText(text: string, maxLength: number): string {
	return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
