/**
 * AsyncLock - Promise-based mutual exclusion.
 *
 * Callers queue in FIFO order; the lock is handed directly to the next waiter
 * on release.
 */
export class AsyncLock {
	private queue: Array<() => void> = [];
	private locked = false;

	async acquire(): Promise<void> {
		return new Promise<void>(resolve => {
			if (!this.locked) {
				this.locked = true;
				resolve();
			} else {
				this.queue.push(resolve);
			}
		});
	}

	release(): void {
		if (!this.locked) {
			throw new Error('Cannot release a lock that is not acquired');
		}

		const next = this.queue.shift();
		if (next) {
			// Pass the lock to the next waiter
			next();
		} else {
			this.locked = false;
		}
	}

	/**
	 * Run `fn` while holding the lock. The lock is released even if `fn` throws.
	 */
	async withLock<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}

	tryAcquire(): boolean {
		if (this.locked) {
			return false;
		}

		this.locked = true;
		return true;
	}

	isLocked(): boolean {
		return this.locked;
	}
}
