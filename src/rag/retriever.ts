/**
 * Retriever
 *
 * Embeds a query with the index's own embedding model, searches the index
 * and keeps only hits at or above the relevance threshold. An empty result
 * is the signal that the documents hold nothing useful for the question.
 */

import { InvalidConfigurationError } from "../errors.js";
import { indexLogger } from "../logger.js";
import type { IndexSource } from "./engine.js";
import { embedTexts } from "./embedder.js";
import type { RetrievedChunk } from "./types.js";

const logger = indexLogger.child({ component: "retriever" });

export interface RetrieveOptions {
	/** Nearest entries to consider */
	k: number;
	/** Minimum cosine similarity a chunk must reach */
	minScore: number;
	signal?: AbortSignal;
}

export class Retriever {
	constructor(private readonly source: IndexSource) {}

	/**
	 * Chunks relevant to `query`, best first
	 *
	 * @throws InvalidConfigurationError for a non-positive k or a threshold outside [-1, 1]
	 * @throws EmbeddingUnavailableError if the query cannot be embedded
	 */
	async retrieve(query: string, options: RetrieveOptions): Promise<RetrievedChunk[]> {
		const { k, minScore, signal } = options;
		if (!Number.isInteger(k) || k < 1) {
			throw new InvalidConfigurationError(`k must be a positive integer, got ${k}`, "k");
		}
		if (!(minScore >= -1 && minScore <= 1)) {
			throw new InvalidConfigurationError(`minScore must be within [-1, 1], got ${minScore}`, "minScore");
		}

		const index = this.source.index;
		if (index.size === 0 || !query.trim()) {
			return [];
		}

		const [queryVector] = await embedTexts(this.source.embeddingProvider, [query], signal);
		const hits = index.search(queryVector, k);
		const results = hits
			.filter((hit) => hit.score >= minScore)
			.map((hit) => ({ chunk: hit.entry.chunk, score: hit.score, sourceName: hit.entry.sourceName }));

		logger.debug(
			{ candidates: hits.length, kept: results.length, topScore: hits[0]?.score ?? null, minScore },
			"Retrieval complete",
		);
		return results;
	}
}
