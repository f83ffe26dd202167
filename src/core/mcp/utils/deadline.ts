/**
 * Deadline helpers shared by connect, invoke and close.
 *
 * Every blocking lifecycle operation runs through `withDeadline`, which aborts
 * the operation's signal and rejects as soon as the budget is spent, whether or
 * not the operation itself reacts to the abort.
 */

export class DeadlineExceededError extends Error {
	public readonly timeoutMs: number;

	constructor(timeoutMs: number, label = 'Operation') {
		super(`${label} timed out after ${timeoutMs}ms`);
		this.name = 'DeadlineExceededError';
		this.timeoutMs = timeoutMs;
	}
}

export interface DeadlineOptions {
	/** Caller's signal; aborting it rejects with its reason */
	signal?: AbortSignal;
	/** Used in the timeout message */
	label?: string;
}

export function withDeadline<T>(
	operation: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	options: DeadlineOptions = {}
): Promise<T> {
	const controller = new AbortController();
	const parent = options.signal;

	return new Promise<T>((resolve, reject) => {
		let settled = false;

		const finish = (settle: () => void): void => {
			if (settled) return;
			settled = true;
			clearTimeout(timeoutId);
			parent?.removeEventListener('abort', onParentAbort);
			settle();
		};

		const onParentAbort = (): void => {
			const reason: unknown = parent?.reason;
			controller.abort(reason);
			finish(() => reject(reason));
		};

		const timeoutId = setTimeout(
			() => {
				const error = new DeadlineExceededError(timeoutMs, options.label);
				controller.abort(error);
				finish(() => reject(error));
			},
			Math.max(0, timeoutMs)
		);

		if (parent?.aborted) {
			onParentAbort();
			return;
		}
		parent?.addEventListener('abort', onParentAbort, { once: true });

		let pending: Promise<T>;
		try {
			pending = operation(controller.signal);
		} catch (error) {
			finish(() => reject(error));
			return;
		}

		pending.then(
			value => finish(() => resolve(value)),
			(error: unknown) => finish(() => reject(error))
		);
	});
}

/**
 * Resolve after `ms`, or immediately when `ms` is 0.
 */
export function delay(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise(resolve => setTimeout(resolve, ms));
}
