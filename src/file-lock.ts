/**
 * File Lock Utility
 *
 * Guards the persisted index file and ingestion cache entries against two
 * agent processes sharing one state directory. Inside a process, writers are
 * already serialized by the mutexes in concurrency.ts.
 *
 * The lock is proper-lockfile's sibling `<path>.lock` directory, so the
 * guarded file does not have to exist yet.
 */

import { lock, type LockOptions } from "proper-lockfile";
import {
	FILE_LOCK_BACKOFF_FACTOR,
	FILE_LOCK_MAX_DELAY_MS,
	FILE_LOCK_MIN_DELAY_MS,
	FILE_LOCK_STALE_MS,
	MAX_FILE_LOCK_RETRIES,
} from "./constants.js";
import { storeLogger } from "./logger.js";

const logger = storeLogger.child({ component: "file-lock" });

export interface FileLockOptions {
	/** Acquisition attempts after the first (default: 5) */
	maxRetries?: number;
	/** First backoff delay in ms (default: 50) */
	minDelayMs?: number;
	/** Backoff ceiling in ms (default: 1000) */
	maxDelayMs?: number;
	/** Backoff multiplier (default: 2) */
	exponentialFactor?: number;
	/** A lock older than this is taken over (default: 30000) */
	stale?: number;
}

function toLockOptions(options: FileLockOptions = {}): LockOptions {
	return {
		retries: {
			retries: options.maxRetries ?? MAX_FILE_LOCK_RETRIES,
			minTimeout: options.minDelayMs ?? FILE_LOCK_MIN_DELAY_MS,
			maxTimeout: options.maxDelayMs ?? FILE_LOCK_MAX_DELAY_MS,
			factor: options.exponentialFactor ?? FILE_LOCK_BACKOFF_FACTOR,
			randomize: true,
		},
		stale: options.stale ?? FILE_LOCK_STALE_MS,
		realpath: false,
	};
}

/**
 * Run `fn` while holding the lock for `filePath`.
 *
 * A lock that stays contended after every retry is logged and skipped; the
 * write still happens. Release failures are logged and never mask the
 * result of `fn`.
 */
export async function withFileLockAsync<T>(
	filePath: string,
	fn: () => Promise<T>,
	options?: FileLockOptions,
): Promise<T> {
	const release = await lock(filePath, toLockOptions(options)).catch((error: unknown) => {
		logger.warn({ filePath, error: String(error) }, "Lock still contended after retries, writing without it");
		return null;
	});
	if (!release) {
		return fn();
	}

	try {
		return await fn();
	} finally {
		await release().catch((error: unknown) => {
			logger.debug({ filePath, error: String(error) }, "Lock release failed");
		});
	}
}
