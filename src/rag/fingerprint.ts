/**
 * Content fingerprints and cache keys
 */

import { createHash } from "node:crypto";
import type { CacheKey } from "./types.js";

/**
 * sha256 hex digest of a document's raw bytes
 */
export function fingerprintBytes(bytes: Uint8Array): string {
	return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Content address of a cache entry
 *
 * Every component of the key takes part, so changing the chunking or the
 * embedding model lands on a different entry.
 */
export function cacheKeyHash(key: CacheKey): string {
	const canonical = JSON.stringify([
		key.fingerprint,
		key.chunking.maxSize,
		key.chunking.overlap,
		key.embeddingModelId,
	]);
	return createHash("sha256").update(canonical).digest("hex");
}
