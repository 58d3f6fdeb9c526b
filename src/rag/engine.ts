/**
 * RAG Engine
 *
 * Owns the vector index and runs the ingestion path:
 * bytes → text → chunks → vectors → index, gated by the ingestion cache.
 *
 * Also provides document management (list, remove), switching the index to
 * another embedding model, and statistics.
 *
 * Concurrency:
 * - at most one ingestion per fingerprint in flight (KeyedMutex)
 * - index mutations and persistence are serialized (AsyncMutex)
 * - the cache is written and the index persisted only after every chunk of a
 *   document has been embedded, so an aborted or failed ingestion leaves no
 *   trace
 */

import { join } from "node:path";
import type { AgentConfig, ChunkingConfig } from "../config.js";
import { AsyncMutex, KeyedMutex } from "../concurrency.js";
import { INDEX_FILE_NAME } from "../constants.js";
import { InvalidConfigurationError } from "../errors.js";
import { ingestLogger } from "../logger.js";
import { BoundaryChunker, type Chunker, validateChunkingConfig } from "./chunker.js";
import { type EmbeddingProvider, type EmbeddingProviderRegistry, embedTexts } from "./embedder.js";
import { fingerprintBytes } from "./fingerprint.js";
import { loadIndex, saveIndex } from "./index-store.js";
import type { IngestionCache } from "./ingestion-cache.js";
import { detectDocumentType, loadDocumentText } from "./loader.js";
import type { CacheEntry, CacheKey, Document, IndexStats, IngestOptions, IngestResult, VectorIndexEntry } from "./types.js";
import { VectorIndex } from "./vector-index.js";

const logger = ingestLogger.child({ component: "engine" });

export interface RagEngineOptions {
	config: Pick<AgentConfig, "stateDir" | "chunking" | "embedding">;
	embeddings: EmbeddingProviderRegistry;
	cache: IngestionCache;
	chunker?: Chunker;
	/** Where the index is persisted; null keeps it in memory only */
	indexPath?: string | null;
}

/**
 * Result of re-embedding every document under another model
 */
export interface SwitchModelResult {
	previousModelId: string;
	embeddingModelId: string;
	documents: number;
	entries: number;
}

function sameChunking(a: ChunkingConfig, b: ChunkingConfig): boolean {
	return a.maxSize === b.maxSize && a.overlap === b.overlap;
}

/**
 * Read access the retriever needs; the engine swaps its index on model switch
 */
export interface IndexSource {
	readonly index: VectorIndex;
	readonly embeddingProvider: EmbeddingProvider;
}

export class RagEngine implements IndexSource {
	private currentIndex: VectorIndex;
	private readonly chunker: Chunker;
	private readonly indexPath: string | null;
	private readonly ingestLocks = new KeyedMutex();
	private readonly writeLock = new AsyncMutex();

	constructor(
		private readonly options: RagEngineOptions,
		index?: VectorIndex,
	) {
		this.chunker = options.chunker ?? new BoundaryChunker();
		this.indexPath =
			options.indexPath === undefined ? join(options.config.stateDir, INDEX_FILE_NAME) : options.indexPath;

		const defaultModel = options.config.embedding.defaultModel;
		this.currentIndex = index ?? new VectorIndex(defaultModel, options.embeddings.get(defaultModel).dimensions);
	}

	/**
	 * Create an engine, restoring the persisted index when one exists
	 *
	 * A persisted index keeps the embedding model it was built with, even if
	 * the configured default has changed since.
	 */
	static open(options: RagEngineOptions): RagEngine {
		const indexPath =
			options.indexPath === undefined ? join(options.config.stateDir, INDEX_FILE_NAME) : options.indexPath;
		const index = indexPath ? loadIndex(indexPath) : null;
		if (index) {
			if (index.embeddingModelId !== options.config.embedding.defaultModel) {
				logger.info(
					{ indexModel: index.embeddingModelId, configuredModel: options.config.embedding.defaultModel },
					"Persisted index uses a different embedding model than configured; keeping the index model",
				);
			}
			logger.info({ documents: index.documentCount, entries: index.size }, "Vector index restored");
		}
		return new RagEngine(options, index ?? undefined);
	}

	get index(): VectorIndex {
		return this.currentIndex;
	}

	get embeddingModelId(): string {
		return this.currentIndex.embeddingModelId;
	}

	get embeddingProvider(): EmbeddingProvider {
		return this.options.embeddings.get(this.currentIndex.embeddingModelId);
	}

	// =========================================================================
	// Ingestion
	// =========================================================================

	/**
	 * Ingest one document
	 *
	 * @throws UnsupportedFormatError for unknown types or unreadable content
	 * @throws InvalidConfigurationError for bad chunking or a model other than the index's
	 * @throws EmbeddingUnavailableError / DimensionMismatchError from embedding
	 */
	async ingest(opts: IngestOptions): Promise<IngestResult> {
		const chunking = opts.chunking ?? this.options.config.chunking;
		validateChunkingConfig(chunking.maxSize, chunking.overlap);

		const embeddingModelId = opts.embeddingModelId ?? this.embeddingModelId;
		this.assertIndexModel(embeddingModelId);

		const type = opts.type ?? detectDocumentType(opts.sourceName);
		const fingerprint = fingerprintBytes(opts.bytes);

		return this.ingestLocks.runExclusive(fingerprint, async () => {
			const existing = this.currentIndex.getDocument(fingerprint);
			if (existing && sameChunking(existing.chunking, chunking)) {
				logger.debug({ fingerprint, sourceName: opts.sourceName }, "Document already indexed, skipping");
				return {
					fingerprint,
					sourceName: existing.sourceName,
					chunksIndexed: this.currentIndex.countEntries(fingerprint),
					fromCache: false,
					alreadyIndexed: true,
				};
			}

			const text = await loadDocumentText(opts.bytes, opts.sourceName, type);
			const key: CacheKey = { fingerprint, chunking, embeddingModelId };
			const { items, fromCache } = await this.chunkAndEmbed(text, key, opts.signal);

			const document: Document = {
				fingerprint,
				sourceName: opts.sourceName,
				type,
				text,
				chunking: { ...chunking },
				indexedAt: new Date().toISOString(),
			};
			const entries: VectorIndexEntry[] = items.map(({ chunk, vector }) => ({
				chunk,
				vector,
				documentFingerprint: fingerprint,
				sourceName: opts.sourceName,
			}));

			opts.signal?.throwIfAborted();
			const superseded = await this.commit(document, entries, embeddingModelId);

			logger.info(
				{ fingerprint, sourceName: opts.sourceName, chunks: entries.length, fromCache, superseded },
				"Document indexed",
			);

			return {
				fingerprint,
				sourceName: opts.sourceName,
				chunksIndexed: entries.length,
				fromCache,
				alreadyIndexed: false,
				...(superseded ? { superseded } : {}),
			};
		});
	}

	/**
	 * Chunk and embed, or reuse the cached result for the same key
	 */
	private async chunkAndEmbed(
		text: string,
		key: CacheKey,
		signal?: AbortSignal,
	): Promise<{ items: CacheEntry["items"]; fromCache: boolean }> {
		const provider = this.options.embeddings.get(key.embeddingModelId);
		const cached = await this.options.cache.lookup(key);
		if (cached) {
			const stale = cached.items.find((item) => item.vector.length !== provider.dimensions);
			if (!stale) {
				return { items: cached.items, fromCache: true };
			}
			logger.warn(
				{ fingerprint: key.fingerprint, expected: provider.dimensions, actual: stale.vector.length },
				"Cached vectors do not match the model's dimensions, embedding again",
			);
		}

		const chunks = this.chunker.chunk(text, key.fingerprint, key.chunking);
		const vectors = await embedTexts(
			provider,
			chunks.map((c) => c.text),
			signal,
		);
		const items = chunks.map((chunk, i) => ({ chunk, vector: vectors[i] }));

		signal?.throwIfAborted();
		await this.options.cache.store({ key, items, createdAt: new Date().toISOString() });
		return { items, fromCache: false };
	}

	/**
	 * Replace any previous version of the document and persist
	 *
	 * @returns Fingerprint of a superseded document with the same source name
	 */
	private async commit(
		document: Document,
		entries: VectorIndexEntry[],
		embeddingModelId: string,
	): Promise<string | undefined> {
		return this.writeLock.runExclusive(async () => {
			// The index may have been switched to another model while embedding
			this.assertIndexModel(embeddingModelId);

			const next = this.currentIndex.clone();
			const previous = next.findDocumentBySource(document.sourceName);
			const superseded = previous && previous.fingerprint !== document.fingerprint ? previous.fingerprint : undefined;
			if (superseded) {
				next.removeDocument(superseded);
			}
			next.removeDocument(document.fingerprint);
			next.addDocument(document, entries);
			await this.replaceIndex(next);
			return superseded;
		});
	}

	private assertIndexModel(embeddingModelId: string): void {
		if (embeddingModelId !== this.currentIndex.embeddingModelId) {
			throw new InvalidConfigurationError(
				`Index is built with ${this.currentIndex.embeddingModelId}; switch the index to ${embeddingModelId} before ingesting with it`,
				"embeddingModelId",
			);
		}
	}

	/**
	 * Persist `next`, then make it the live index. A failed save leaves the
	 * live index as it was.
	 */
	private async replaceIndex(next: VectorIndex): Promise<void> {
		if (this.indexPath) {
			await saveIndex(next, this.indexPath);
		}
		this.currentIndex = next;
	}

	// =========================================================================
	// Document management
	// =========================================================================

	listDocuments(): Document[] {
		return this.currentIndex.listDocuments();
	}

	/**
	 * Remove a document and its entries from the index
	 *
	 * @returns false when no document has that fingerprint
	 */
	async removeDocument(fingerprint: string): Promise<boolean> {
		return this.writeLock.runExclusive(async () => {
			if (!this.currentIndex.getDocument(fingerprint)) {
				return false;
			}
			const next = this.currentIndex.clone();
			const removed = next.removeDocument(fingerprint);
			await this.replaceIndex(next);
			logger.info({ fingerprint, entries: removed }, "Document removed from index");
			return true;
		});
	}

	/**
	 * Drop every document from the index
	 */
	async clearIndex(): Promise<void> {
		await this.writeLock.runExclusive(async () => {
			const next = this.currentIndex.clone();
			next.clear();
			await this.replaceIndex(next);
			logger.info("Vector index cleared");
		});
	}

	/**
	 * Remove every ingestion cache entry
	 */
	async clearCache(): Promise<number> {
		return this.options.cache.clear();
	}

	/**
	 * Rebuild the index under another embedding model
	 *
	 * Every stored document is re-chunked with its own chunking configuration
	 * and re-embedded (cache hits are reused). The new index replaces the old
	 * one only if every document succeeds; otherwise the old index stays.
	 * Passing the current model id rebuilds in place.
	 *
	 * @throws InvalidConfigurationError for an unknown model identity
	 */
	async switchEmbeddingModel(embeddingModelId: string, signal?: AbortSignal): Promise<SwitchModelResult> {
		const provider = this.options.embeddings.get(embeddingModelId);

		return this.writeLock.runExclusive(async () => {
			const previousModelId = this.currentIndex.embeddingModelId;
			const next = new VectorIndex(embeddingModelId, provider.dimensions);

			for (const doc of this.currentIndex.listDocuments()) {
				const key: CacheKey = { fingerprint: doc.fingerprint, chunking: doc.chunking, embeddingModelId };
				const { items } = await this.chunkAndEmbed(doc.text, key, signal);
				next.addDocument(
					{ ...doc },
					items.map(({ chunk, vector }) => ({
						chunk,
						vector,
						documentFingerprint: doc.fingerprint,
						sourceName: doc.sourceName,
					})),
				);
			}

			signal?.throwIfAborted();
			await this.replaceIndex(next);

			logger.info(
				{ previousModelId, embeddingModelId, documents: next.documentCount, entries: next.size },
				"Index switched to new embedding model",
			);
			return { previousModelId, embeddingModelId, documents: next.documentCount, entries: next.size };
		});
	}

	// =========================================================================
	// Statistics
	// =========================================================================

	stats(): IndexStats {
		const index = this.currentIndex;
		return {
			embeddingModelId: index.embeddingModelId,
			dimensions: index.dimensions,
			documentCount: index.documentCount,
			entryCount: index.size,
			documents: index.listDocuments().map((doc) => ({
				fingerprint: doc.fingerprint,
				sourceName: doc.sourceName,
				type: doc.type,
				chunkCount: index.countEntries(doc.fingerprint),
			})),
		};
	}
}
