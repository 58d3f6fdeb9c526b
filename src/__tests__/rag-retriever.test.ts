/**
 * Tests for the retriever
 */

import { beforeEach, describe, expect, it } from "vitest";

import { EmbeddingUnavailableError, InvalidConfigurationError } from "../errors.js";
import { EmbeddingProviderRegistry } from "../rag/embedder.js";
import { RagEngine } from "../rag/engine.js";
import { Retriever } from "../rag/retriever.js";
import { bytes, createTestConfig, MemoryIngestionCache } from "./helpers.js";

const FACT = "Paris is the capital of France, according to the report.";
const FILLER = "The museum is open every day except Monday.";

describe("rag/retriever.ts", () => {
	let engine: RagEngine;
	let embeddings: EmbeddingProviderRegistry;
	let retriever: Retriever;

	beforeEach(() => {
		const config = createTestConfig();
		embeddings = new EmbeddingProviderRegistry(config);
		engine = new RagEngine({ config, embeddings, cache: new MemoryIngestionCache(), indexPath: null });
		retriever = new Retriever(engine);
	});

	it("should rank the chunk holding the fact first", async () => {
		await engine.ingest({ bytes: bytes(FILLER), sourceName: "museum.txt" });
		await engine.ingest({ bytes: bytes(FACT), sourceName: "report.txt" });

		const results = await retriever.retrieve("What is the capital of France mentioned in the uploaded report?", {
			k: 3,
			minScore: 0.5,
		});

		expect(results).toHaveLength(1);
		expect(results[0].sourceName).toBe("report.txt");
		expect(results[0].chunk.text).toBe(FACT);
		expect(results[0].score).toBeCloseTo(13 / 24, 10);
	});

	it("should return nothing at a threshold of 1 unless the content is identical", async () => {
		await engine.ingest({ bytes: bytes("Paris capital France"), sourceName: "short.txt" });

		expect(await retriever.retrieve("France capital Paris capital Paris France", { k: 3, minScore: 1 })).toEqual([]);
		expect(await retriever.retrieve("France capital Paris", { k: 3, minScore: 1 })).toEqual([]);

		const [identical] = await retriever.retrieve("Paris capital France", { k: 3, minScore: 0.99 });
		expect(identical.sourceName).toBe("short.txt");
		expect(identical.score).toBeCloseTo(1, 12);
	});

	it("should keep hits at or above a lower threshold, best first", async () => {
		await engine.ingest({ bytes: bytes(FILLER), sourceName: "museum.txt" });
		await engine.ingest({ bytes: bytes(FACT), sourceName: "report.txt" });

		const results = await retriever.retrieve("capital of France", { k: 3, minScore: 0 });
		expect(results.map((r) => r.sourceName)).toEqual(["report.txt", "museum.txt"]);
		expect(results[1].score).toBe(0);
	});

	it("should return nothing for an empty index", async () => {
		expect(await retriever.retrieve("anything at all", { k: 3, minScore: 0.5 })).toEqual([]);
	});

	it("should return nothing for a blank query", async () => {
		await engine.ingest({ bytes: bytes(FACT), sourceName: "report.txt" });
		expect(await retriever.retrieve("   ", { k: 3, minScore: 0 })).toEqual([]);
	});

	it("should reject a non-positive k and an out-of-range threshold", async () => {
		await expect(retriever.retrieve("q", { k: 0, minScore: 0.5 })).rejects.toBeInstanceOf(InvalidConfigurationError);
		await expect(retriever.retrieve("q", { k: 3, minScore: 1.5 })).rejects.toThrow(
			"minScore must be within [-1, 1], got 1.5",
		);
	});

	it("should embed the query with the index's own model", async () => {
		await engine.ingest({ bytes: bytes(FACT), sourceName: "report.txt" });
		embeddings.register({
			id: "local-hash",
			dimensions: 512,
			maxBatchSize: 1,
			embedBatch: async () => {
				throw new Error("backend down");
			},
		});

		await expect(retriever.retrieve("capital", { k: 1, minScore: 0 })).rejects.toBeInstanceOf(EmbeddingUnavailableError);
	});
});
