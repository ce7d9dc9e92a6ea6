/**
 * @file Stopwatch.ts
 * @description 秒表工具类，用于测量和记录带标签的时间段
 *
 * Stopwatch utility for measuring and logging elapsed time with labeled segments.
 *
 * Usage: （使用示例）
 * ```typescript
 * const sw = new Stopwatch('Ingest');
 * sw.start('normalize');
 * // ... do work ...
 * sw.start('chunk'); // stops 'normalize'
 * // ... do work ...
 * sw.stop();
 * sw.print();
 * ```
 */
import { formatDuration } from './format-utils';

export class Stopwatch {
	private segments: Array<{ label: string; startTime: number; duration: number }> = [];
	private currentSegment: { label: string; startTime: number } | null = null;

	constructor(private readonly name: string = 'Stopwatch') {}

	/**
	 * Start a new timing segment with the given label.
	 * If a segment is already running, it will be stopped first.
	 *
	 * 启动一个新的计时段落，如果已有段落在运行，会先停止它
	 */
	start(label: string): void {
		if (this.currentSegment) {
			this.stop();
		}
		this.currentSegment = { label, startTime: Date.now() };
	}

	/**
	 * Stop the current timing segment. No-op when nothing is running.
	 */
	stop(): void {
		if (!this.currentSegment) {
			return;
		}
		this.segments.push({
			label: this.currentSegment.label,
			startTime: this.currentSegment.startTime,
			duration: Date.now() - this.currentSegment.startTime,
		});
		this.currentSegment = null;
	}

	/**
	 * Total elapsed time from the first segment start to now (or last segment end).
	 * 获取从第一个段落开始到现在（或最后一个段落结束）的总经过时间
	 */
	getTotalElapsed(): number {
		if (this.segments.length === 0) {
			return this.currentSegment ? Date.now() - this.currentSegment.startTime : 0;
		}
		const first = this.segments[0];
		const last = this.segments[this.segments.length - 1];
		const end = this.currentSegment ? Date.now() : last.startTime + last.duration;
		return end - first.startTime;
	}


	/**
	 * Print all timing segments to console.
	 * Format: [name] Total: 1.2s, then one line per segment
	 */
	print(debug: boolean = true): void {
		const lines = [`[${this.name}] Total: ${formatDuration(this.getTotalElapsed())}`];
		for (const segment of this.segments) {
			lines.push(`  - ${segment.label}: ${formatDuration(segment.duration)}`);
		}
		if (this.currentSegment) {
			const running = Date.now() - this.currentSegment.startTime;
			lines.push(`  - ${this.currentSegment.label}: ${formatDuration(running)} (running)`);
		}
		if (debug) {
			console.debug(lines.join('\n'));
		} else {
			console.log(lines.join('\n'));
		}
	}
}
