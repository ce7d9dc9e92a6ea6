/**
 * @file KeyedLock.ts
 * @description 按 key 串行化的异步互斥锁
 *
 * Async mutual exclusion per key. Tasks holding the same key run one after
 * another in submission order; tasks on different keys run independently.
 *
 * Usage:
 * ```typescript
 * const lock = new KeyedLock();
 * await lock.run(sourceId, async () => { ... });
 * ```
 */
export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	/**
	 * Run `task` once every earlier task for `key` has settled.
	 * The task's result or error is returned to the caller unchanged.
	 *
	 * 等待同一 key 的前序任务完成后执行 task，结果或错误原样返回。
	 */
	async run<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => {};
		const current = new Promise<void>(resolve => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await task();
		} finally {
			release();
			// last holder cleans up
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/**
	 * Whether any task for `key` is running or queued.
	 */
	isLocked(key: string): boolean {
		return this.tails.has(key);
	}
}
