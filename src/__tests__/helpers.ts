/**
 * Test Helpers
 *
 * In-process stand-ins for everything that reaches outside the process:
 * generation backends, the weather service and the ingestion cache.
 */

import { type AgentConfig, getDefaultConfig } from "../config.js";
import type { GenerationBackend, GenerationRequest } from "../llm/types.js";
import { cacheKeyHash } from "../rag/fingerprint.js";
import type { IngestionCache } from "../rag/ingestion-cache.js";
import type { CacheEntry, CacheKey } from "../rag/types.js";
import type { WeatherProvider, WeatherReport } from "../tools/weather.js";

/**
 * Default config scoped to the offline hashing embedder and a short budget
 */
export function createTestConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
	const config = getDefaultConfig();
	config.stateDir = "/tmp/rag-agent-test";
	config.embedding.defaultModel = "local-hash";
	config.retrieval.minScore = 0.5;
	config.generation.timeoutMs = 1000;
	return { ...config, ...overrides };
}

/**
 * Resolve once `signal` aborts, rejecting with its reason
 */
export function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
	return new Promise<never>((_, reject) => {
		if (!signal) return;
		if (signal.aborted) {
			reject(signal.reason);
			return;
		}
		signal.addEventListener("abort", () => reject(signal.reason), { once: true });
	});
}

export type FakeReply = string | Error | "hang";

/**
 * Scripted generation backend
 *
 * Replies are consumed in order; the last one repeats. "hang" waits for the
 * request signal, the way a stalled model server does.
 */
export class FakeGenerationBackend implements GenerationBackend {
	readonly kind = "ollama";
	readonly calls: Array<{ model: string; request: GenerationRequest }> = [];
	private readonly replies: FakeReply[];

	constructor(...replies: FakeReply[]) {
		this.replies = replies.length > 0 ? replies : ["ok"];
	}

	private next(model: string, request: GenerationRequest): FakeReply {
		this.calls.push({ model, request });
		return this.replies.length > 1 ? (this.replies.shift() ?? "ok") : this.replies[0];
	}

	async generate(model: string, request: GenerationRequest): Promise<string> {
		const reply = this.next(model, request);
		if (reply === "hang") return waitForAbort(request.signal);
		if (reply instanceof Error) throw reply;
		return reply;
	}

	async *stream(model: string, request: GenerationRequest): AsyncGenerator<string> {
		const reply = this.next(model, request);
		if (reply === "hang") {
			yield "partial ";
			await waitForAbort(request.signal);
			return;
		}
		if (reply instanceof Error) throw reply;
		for (const piece of reply.split(/(?<= )/)) {
			yield piece;
		}
	}

	/** Prompt of the most recent call */
	get lastPrompt(): string {
		return this.calls[this.calls.length - 1]?.request.prompt ?? "";
	}
}

/**
 * Weather provider answering from a fixed table
 */
export class FakeWeatherProvider implements WeatherProvider {
	readonly lookups: string[] = [];

	constructor(private readonly behaviour: "ok" | Error | "hang" = "ok") {}

	async lookup(location: string, signal?: AbortSignal): Promise<WeatherReport> {
		this.lookups.push(location);
		if (this.behaviour === "hang") return waitForAbort(signal);
		if (this.behaviour instanceof Error) throw this.behaviour;
		return {
			location,
			condition: "Sunny",
			temperature: 21,
			asOf: "2024-05-01 10:00:00",
			forecast: [{ date: "2024-05-01", condition: "Sunny", high: 25, low: 14 }],
		};
	}
}

/**
 * Ingestion cache kept in a Map, keyed the same way as the file cache
 */
export class MemoryIngestionCache implements IngestionCache {
	readonly entries = new Map<string, CacheEntry>();
	lookups = 0;
	stores = 0;

	async lookup(key: CacheKey): Promise<CacheEntry | undefined> {
		this.lookups++;
		return this.entries.get(cacheKeyHash(key));
	}

	async store(entry: CacheEntry): Promise<void> {
		this.stores++;
		this.entries.set(cacheKeyHash(entry.key), entry);
	}

	async clear(): Promise<number> {
		const removed = this.entries.size;
		this.entries.clear();
		return removed;
	}
}

/** UTF-8 bytes of a string */
export function bytes(text: string): Uint8Array {
	return new TextEncoder().encode(text);
}
