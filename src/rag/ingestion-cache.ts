/**
 * Ingestion Cache
 *
 * Content-addressed store of chunked and embedded documents. The address is
 * the sha256 of (fingerprint, maxSize, overlap, embedding model id), so an
 * entry can never go stale: any change of a key component addresses a
 * different file.
 *
 * The cache is an optimization only. Unreadable or invalid entries are
 * treated as misses, and failing to store an entry does not fail ingestion.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { withFileLockAsync } from "../file-lock.js";
import { storeLogger } from "../logger.js";
import { cacheKeyHash } from "./fingerprint.js";
import type { CacheEntry, CacheKey } from "./types.js";

const logger = storeLogger.child({ component: "ingestion-cache" });

const ChunkSchema = z.object({
	id: z.string(),
	documentFingerprint: z.string(),
	index: z.number().int().min(0),
	text: z.string(),
	start: z.number().int().min(0),
	end: z.number().int().min(0),
});

const CacheEntrySchema = z.object({
	key: z.object({
		fingerprint: z.string(),
		chunking: z.object({ maxSize: z.number().int(), overlap: z.number().int() }),
		embeddingModelId: z.string(),
	}),
	items: z.array(z.object({ chunk: ChunkSchema, vector: z.array(z.number()) })),
	createdAt: z.string(),
});

/**
 * Ingestion cache contract
 */
export interface IngestionCache {
	lookup(key: CacheKey): Promise<CacheEntry | undefined>;
	store(entry: CacheEntry): Promise<void>;
	/** Remove every entry; returns how many were removed */
	clear(): Promise<number>;
}

function sameKey(a: CacheKey, b: CacheKey): boolean {
	return (
		a.fingerprint === b.fingerprint &&
		a.chunking.maxSize === b.chunking.maxSize &&
		a.chunking.overlap === b.chunking.overlap &&
		a.embeddingModelId === b.embeddingModelId
	);
}

/**
 * One JSON file per entry under `<stateDir>/cache`
 */
export class FileIngestionCache implements IngestionCache {
	constructor(private readonly cacheDir: string) {}

	entryPath(key: CacheKey): string {
		return path.join(this.cacheDir, `${cacheKeyHash(key)}.json`);
	}

	async lookup(key: CacheKey): Promise<CacheEntry | undefined> {
		const filePath = this.entryPath(key);
		let raw: string;
		try {
			raw = await fs.promises.readFile(filePath, "utf-8");
		} catch (error) {
			if (error instanceof Error && "code" in error && error.code === "ENOENT") {
				return undefined;
			}
			logger.warn({ filePath, error: String(error) }, "Cache entry unreadable, treating as miss");
			return undefined;
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (error) {
			logger.warn({ filePath, error: String(error) }, "Cache entry is not valid JSON, treating as miss");
			return undefined;
		}

		const result = CacheEntrySchema.safeParse(parsed);
		if (!result.success) {
			logger.warn({ filePath, issues: result.error.issues.length }, "Cache entry failed validation, treating as miss");
			return undefined;
		}
		if (!sameKey(result.data.key, key)) {
			logger.warn({ filePath }, "Cache entry key does not match its address, treating as miss");
			return undefined;
		}

		logger.debug({ fingerprint: key.fingerprint, items: result.data.items.length }, "Cache hit");
		return result.data;
	}

	async store(entry: CacheEntry): Promise<void> {
		const filePath = this.entryPath(entry.key);
		const tempPath = `${filePath}.tmp-${process.pid}`;
		try {
			await fs.promises.mkdir(this.cacheDir, { recursive: true });
			await withFileLockAsync(filePath, async () => {
				// Write to temporary file first, then atomically rename
				await fs.promises.writeFile(tempPath, JSON.stringify(entry), "utf-8");
				await fs.promises.rename(tempPath, filePath);
			});
			logger.debug({ fingerprint: entry.key.fingerprint, items: entry.items.length }, "Cache entry stored");
		} catch (error) {
			logger.warn({ filePath, error: String(error) }, "Failed to store cache entry");
			await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
				logger.debug({ tempPath, error: String(cleanupError) }, "Failed to remove temporary cache file");
			});
		}
	}

	async clear(): Promise<number> {
		let names: string[];
		try {
			names = await fs.promises.readdir(this.cacheDir);
		} catch (error) {
			if (error instanceof Error && "code" in error && error.code === "ENOENT") {
				return 0;
			}
			throw error;
		}

		const entries = names.filter((name) => name.endsWith(".json"));
		await Promise.all(entries.map((name) => fs.promises.rm(path.join(this.cacheDir, name), { force: true })));
		logger.info({ removed: entries.length }, "Ingestion cache cleared");
		return entries.length;
	}
}
