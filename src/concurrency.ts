/**
 * Concurrency Utilities
 *
 * Provides a bounded runner for batched async operations, promise-chained
 * mutexes, and a timeout wrapper that aborts the wrapped operation.
 *
 * Used by:
 * - Embedding batch dispatch
 * - RAG engine (per-fingerprint ingestion lock, single index writer)
 * - Agent orchestrator (one turn at a time, per-path timeouts)
 */

import { TimeoutError } from "./errors.js";

/**
 * Run async tasks with a concurrency limit.
 *
 * Unlike Promise.all(), this ensures at most `limit` tasks run simultaneously.
 * Tasks are started in order and results are returned in the same order as input.
 *
 * @param tasks - Array of async task functions to execute
 * @param limit - Maximum number of concurrent tasks (default: 5)
 * @returns Results in the same order as input tasks
 */
export async function runWithConcurrency<T>(tasks: Array<() => Promise<T>>, limit: number = 5): Promise<T[]> {
	if (tasks.length === 0) return [];
	if (limit < 1) limit = 1;

	const results: T[] = new Array(tasks.length);
	let nextIndex = 0;

	async function runNext(): Promise<void> {
		while (nextIndex < tasks.length) {
			const currentIndex = nextIndex++;
			results[currentIndex] = await tasks[currentIndex]();
		}
	}

	// Start `limit` workers, each processing tasks sequentially
	const workers = Array.from({ length: Math.min(limit, tasks.length) }, () => runNext());
	await Promise.all(workers);

	return results;
}

/**
 * FIFO async mutex.
 *
 * Each caller chains onto the previous holder's completion, so critical
 * sections run one after another in arrival order.
 */
export class AsyncMutex {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	/** True while a critical section is running or queued */
	get locked(): boolean {
		return this.pending > 0;
	}

	async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		this.pending++;
		const previous = this.tail;
		let release: () => void = () => {};
		this.tail = new Promise<void>((resolve) => {
			release = resolve;
		});

		await previous;
		try {
			return await fn();
		} finally {
			this.pending--;
			release();
		}
	}
}

/**
 * One AsyncMutex per key, dropped once nobody holds or waits for it.
 */
export class KeyedMutex {
	private readonly mutexes = new Map<string, AsyncMutex>();

	async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
		let mutex = this.mutexes.get(key);
		if (!mutex) {
			mutex = new AsyncMutex();
			this.mutexes.set(key, mutex);
		}
		const held = mutex;
		try {
			return await held.runExclusive(fn);
		} finally {
			if (!held.locked && this.mutexes.get(key) === held) {
				this.mutexes.delete(key);
			}
		}
	}

	/** Number of keys currently held or awaited */
	get size(): number {
		return this.mutexes.size;
	}
}

/**
 * Run an abortable operation under a time budget.
 *
 * The operation receives a signal that fires when the budget elapses or the
 * parent signal aborts. On timeout the returned promise rejects with
 * TimeoutError even if the operation ignores its signal.
 *
 * @param operation - Name used in the timeout error
 * @param timeoutMs - Budget in milliseconds
 * @param fn - Operation to run
 * @param parent - Optional caller signal
 */
export async function withTimeout<T>(
	operation: string,
	timeoutMs: number,
	fn: (signal: AbortSignal) => Promise<T>,
	parent?: AbortSignal,
): Promise<T> {
	const controller = new AbortController();
	const onParentAbort = (): void => controller.abort(parent?.reason);
	if (parent?.aborted) {
		controller.abort(parent.reason);
	} else {
		parent?.addEventListener("abort", onParentAbort, { once: true });
	}

	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const error = new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, operation, timeoutMs);
			controller.abort(error);
			reject(error);
		}, timeoutMs);
	});

	try {
		return await Promise.race([fn(controller.signal), timeout]);
	} finally {
		clearTimeout(timer);
		parent?.removeEventListener("abort", onParentAbort);
	}
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it aborts.
 *
 * The underlying operation is not stopped; pass the same signal to it for that.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const onAbort = (): void => reject(signal.reason);
		void promise.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
		if (signal.aborted) {
			onAbort();
			return;
		}
		signal.addEventListener("abort", onAbort, { once: true });
	});
}
