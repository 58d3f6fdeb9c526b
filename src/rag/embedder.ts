/**
 * Embedder Module
 *
 * Uniform capability interface over interchangeable embedding backends:
 * - ollama: embedding models served by a local Ollama through the AI SDK
 * - hashing: offline feature-hashing bag of words, no backend needed
 *
 * Providers are selected by model identity through EmbeddingProviderRegistry.
 * embedTexts() is the only entry point the rest of the pipeline uses: it
 * batches, checks shapes, and fails the whole call if any batch fails.
 */

import { embedMany } from "ai";
import type { AgentConfig, EmbeddingModelConfig } from "../config.js";
import { runWithConcurrency } from "../concurrency.js";
import { AppError, DimensionMismatchError, EmbeddingUnavailableError, InvalidConfigurationError } from "../errors.js";
import { ingestLogger } from "../logger.js";
import { describeOllamaFailure, getOllamaClient } from "../ollama-client.js";
import { tokenize } from "./tokenize.js";

const logger = ingestLogger.child({ component: "embedder" });

/** Batches in flight at once per embedTexts call */
const EMBED_BATCH_CONCURRENCY = 2;

/**
 * Embedding backend capability
 */
export interface EmbeddingProvider {
	/** Embedding model identity; vectors of different ids are never compared */
	readonly id: string;
	readonly dimensions: number;
	/** Largest number of texts sent in one embedBatch call */
	readonly maxBatchSize: number;
	/** One vector per text, in input order */
	embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * Embed texts through a provider
 *
 * @throws EmbeddingUnavailableError if any batch fails (no partial results)
 * @throws DimensionMismatchError if the provider returns the wrong count or shape
 */
export async function embedTexts(provider: EmbeddingProvider, texts: string[], signal?: AbortSignal): Promise<number[][]> {
	if (texts.length === 0) {
		return [];
	}

	const batches: string[][] = [];
	for (let i = 0; i < texts.length; i += provider.maxBatchSize) {
		batches.push(texts.slice(i, i + provider.maxBatchSize));
	}

	const tasks = batches.map((batch, batchIndex) => async (): Promise<number[][]> => {
		signal?.throwIfAborted();
		let vectors: number[][];
		try {
			vectors = await provider.embedBatch(batch, signal);
		} catch (error) {
			if (signal?.aborted || error instanceof AppError) {
				throw error;
			}
			logger.error({ modelId: provider.id, batchIndex, error: String(error) }, "Embedding batch failed");
			throw new EmbeddingUnavailableError(
				`Embedding with ${provider.id} failed: ${error instanceof Error ? error.message : String(error)}`,
				provider.id,
			);
		}
		assertBatchShape(provider, batch.length, vectors);
		return vectors;
	});

	const results = await runWithConcurrency(tasks, EMBED_BATCH_CONCURRENCY);
	logger.debug({ modelId: provider.id, texts: texts.length, batches: batches.length }, "Embedded texts");
	return results.flat();
}

function assertBatchShape(provider: EmbeddingProvider, expectedCount: number, vectors: number[][]): void {
	if (vectors.length !== expectedCount) {
		throw new DimensionMismatchError(
			`${provider.id} returned ${vectors.length} vectors for ${expectedCount} texts`,
			expectedCount,
			vectors.length,
		);
	}
	for (const vector of vectors) {
		if (vector.length !== provider.dimensions) {
			throw new DimensionMismatchError(
				`${provider.id} declares ${provider.dimensions} dimensions but returned ${vector.length}`,
				provider.dimensions,
				vector.length,
			);
		}
	}
}

// ============================================================================
// Ollama backend
// ============================================================================

export interface OllamaEmbeddingProviderOptions {
	id: string;
	/** Ollama model name (defaults to id) */
	model?: string;
	dimensions: number;
	batchSize: number;
	baseUrl: string;
}

/**
 * Embeddings from a local Ollama server
 *
 * The AI SDK retries failed calls by default; retries are turned off so a
 * failure surfaces to the caller unchanged.
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
	readonly id: string;
	readonly dimensions: number;
	readonly maxBatchSize: number;
	private readonly model: string;
	private readonly baseUrl: string;

	constructor(options: OllamaEmbeddingProviderOptions) {
		this.id = options.id;
		this.model = options.model ?? options.id;
		this.dimensions = options.dimensions;
		this.maxBatchSize = options.batchSize;
		this.baseUrl = options.baseUrl;
	}

	async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		try {
			const { embeddings } = await embedMany({
				model: getOllamaClient(this.baseUrl).textEmbeddingModel(this.model),
				values: texts,
				maxRetries: 0,
				abortSignal: signal,
			});
			return embeddings;
		} catch (error) {
			if (signal?.aborted) {
				throw error;
			}
			throw new EmbeddingUnavailableError(describeOllamaFailure(error, this.baseUrl, this.model), this.id);
		}
	}
}

// ============================================================================
// Hashing backend
// ============================================================================

/**
 * 32-bit FNV-1a hash of a string's UTF-16 code units
 */
export function fnv1a(value: string): number {
	let hash = 0x811c9dc5;
	for (let i = 0; i < value.length; i++) {
		hash ^= value.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193);
	}
	return hash >>> 0;
}

/** Weight of an adjacent token pair relative to a single token */
const PAIR_WEIGHT = 0.5;

/**
 * Offline feature-hashing embedder
 *
 * Each token adds 1 to the bucket `fnv1a(token) % dimensions`, and each
 * adjacent pair of tokens adds PAIR_WEIGHT to the bucket of `"first second"`.
 * Pairs keep word order in the vector, so reordered or repeated text no
 * longer scores as identical. Weights are never negative. Text without
 * tokens maps to the zero vector.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
	readonly maxBatchSize: number;

	constructor(
		readonly id: string,
		readonly dimensions: number,
		batchSize = 256,
	) {
		if (!Number.isInteger(dimensions) || dimensions <= 0) {
			throw new InvalidConfigurationError(`dimensions must be a positive integer, got ${dimensions}`, "dimensions");
		}
		this.maxBatchSize = batchSize;
	}

	embed(text: string): number[] {
		const vector = new Array<number>(this.dimensions).fill(0);
		const tokens = tokenize(text);
		tokens.forEach((token, i) => {
			vector[fnv1a(token) % this.dimensions] += 1;
			if (i > 0) {
				vector[fnv1a(`${tokens[i - 1]} ${token}`) % this.dimensions] += PAIR_WEIGHT;
			}
		});
		return vector;
	}

	async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		signal?.throwIfAborted();
		return texts.map((text) => this.embed(text));
	}
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Build a provider for one configured embedding model
 */
export function createEmbeddingProvider(model: EmbeddingModelConfig, ollamaBaseUrl: string): EmbeddingProvider {
	switch (model.backend) {
		case "ollama":
			return new OllamaEmbeddingProvider({
				id: model.id,
				model: model.model,
				dimensions: model.dimensions,
				batchSize: model.batchSize,
				baseUrl: ollamaBaseUrl,
			});
		case "hashing":
			return new HashingEmbeddingProvider(model.id, model.dimensions, model.batchSize);
	}
}

/**
 * Embedding providers by model identity
 *
 * Configured models are built lazily on first use; register() adds or
 * replaces a provider under its own id.
 */
export class EmbeddingProviderRegistry {
	private readonly providers = new Map<string, EmbeddingProvider>();

	constructor(private readonly config: Pick<AgentConfig, "embedding" | "ollamaBaseUrl">) {}

	register(provider: EmbeddingProvider): void {
		this.providers.set(provider.id, provider);
	}

	has(id: string): boolean {
		return this.providers.has(id) || this.config.embedding.models.some((m) => m.id === id);
	}

	/**
	 * @throws InvalidConfigurationError for an unknown model identity
	 */
	get(id: string): EmbeddingProvider {
		const existing = this.providers.get(id);
		if (existing) {
			return existing;
		}
		const model = this.config.embedding.models.find((m) => m.id === id);
		if (!model) {
			throw new InvalidConfigurationError(`Unknown embedding model: ${id}`, "embeddingModelId");
		}
		const provider = createEmbeddingProvider(model, this.config.ollamaBaseUrl);
		this.providers.set(id, provider);
		return provider;
	}

	/** Identities of every configured or registered model */
	list(): string[] {
		const ids = new Set(this.config.embedding.models.map((m) => m.id));
		for (const id of this.providers.keys()) {
			ids.add(id);
		}
		return [...ids];
	}
}
