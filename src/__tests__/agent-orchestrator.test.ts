/**
 * Tests for the agent orchestrator
 *
 * Runs whole turns through an in-memory runtime: hashing embeddings, a
 * scripted generation backend and a fake weather provider.
 */

import { describe, expect, it } from "vitest";

import type { TurnState } from "../agent/orchestrator.js";
import { CHAT_SYSTEM_PROMPT, NO_CONTEXT_MARKER, RAG_SYSTEM_PROMPT } from "../agent/prompt.js";
import type { AgentConfig } from "../config.js";
import { ToolUnavailableError } from "../errors.js";
import { createRuntime, type Runtime } from "../runtime.js";
import type { WeatherReport } from "../tools/weather.js";
import {
	bytes,
	createTestConfig,
	FakeGenerationBackend,
	FakeWeatherProvider,
	MemoryIngestionCache,
	waitForAbort,
} from "./helpers.js";

const FACT = "Paris is the capital of France, according to the report.";
const CAPITAL_QUESTION = "What is the capital of France mentioned in the uploaded report?";

interface Harness {
	runtime: Runtime;
	backend: FakeGenerationBackend;
	weather: FakeWeatherProvider;
	cache: MemoryIngestionCache;
}

function createHarness(
	options: { replies?: ConstructorParameters<typeof FakeGenerationBackend>; weather?: FakeWeatherProvider } = {},
	configure: (config: AgentConfig) => void = () => {},
): Harness {
	const config = createTestConfig();
	configure(config);
	const backend = new FakeGenerationBackend(...(options.replies ?? ["The answer."]));
	const weather = options.weather ?? new FakeWeatherProvider();
	const cache = new MemoryIngestionCache();
	const runtime = createRuntime(config, {
		inMemory: true,
		cache,
		generationBackends: { ollama: backend },
		weatherProvider: weather,
	});
	return { runtime, backend, weather, cache };
}

/**
 * Weather provider that cancels the turn once its lookup is done
 */
class AbortingWeatherProvider extends FakeWeatherProvider {
	constructor(private readonly controller: AbortController) {
		super();
	}

	override async lookup(location: string, signal?: AbortSignal): Promise<WeatherReport> {
		const report = await super.lookup(location, signal);
		this.controller.abort();
		return report;
	}
}

describe("agent/orchestrator.ts", () => {
	describe("routing", () => {
		it("should invoke the weather tool for a weather question", async () => {
			const { runtime, backend, weather } = createHarness();

			const outcome = await runtime.orchestrator.handleTurn({ message: "What's the weather in Beijing?" });

			expect(outcome.state).toBe("DELIVERED");
			expect(outcome.trace).toEqual(["RECEIVED", "CLASSIFIED", "TOOL_INVOKING", "SYNTHESIZING", "DELIVERED"]);
			expect(weather.lookups).toEqual(["Beijing"]);
			expect(outcome.retrieved).toBeNull();
			expect(outcome.turn.toolInvocations).toHaveLength(1);
			expect(outcome.turn.toolInvocations?.[0]).toMatchObject({
				toolName: "query_weather",
				arguments: { location: "Beijing" },
				outcome: { ok: true, result: { location: "Beijing", condition: "Sunny", temperature: 21 } },
			});
			expect(backend.lastPrompt).toContain("## Tool results\nquery_weather({\"location\":\"Beijing\"}) returned:");
			expect(backend.lastPrompt).not.toContain("## Retrieved context");
		});

		it("should answer from the indexed documents", async () => {
			const { runtime, backend } = createHarness();
			await runtime.engine.ingest({ bytes: bytes(FACT), sourceName: "report.txt" });

			const outcome = await runtime.orchestrator.handleTurn({ message: CAPITAL_QUESTION });

			expect(outcome.trace).toEqual(["RECEIVED", "CLASSIFIED", "RETRIEVING", "SYNTHESIZING", "DELIVERED"]);
			expect(outcome.retrieved).toHaveLength(1);
			expect(outcome.turn.sources).toEqual([
				{ sourceName: "report.txt", chunkId: outcome.retrieved?.[0].chunk.id, score: outcome.retrieved?.[0].score },
			]);
			expect(outcome.turn.sources?.[0].score).toBeCloseTo(13 / 24, 10);
			expect(backend.lastPrompt).toContain(`[1] report.txt (relevance 0.54)\n${FACT}`);
			expect(backend.calls[0].request.system).toBe(RAG_SYSTEM_PROMPT);
		});

		it("should synthesize with the no-context marker when nothing is indexed", async () => {
			const { runtime, backend } = createHarness();

			const outcome = await runtime.orchestrator.handleTurn({ message: "Summarize the quarterly results" });

			expect(outcome.state).toBe("DELIVERED");
			expect(outcome.trace).toEqual(["RECEIVED", "CLASSIFIED", "RETRIEVING", "SYNTHESIZING", "DELIVERED"]);
			expect(outcome.retrieved).toEqual([]);
			expect(backend.lastPrompt).toBe(
				`## Retrieved context\n${NO_CONTEXT_MARKER}\n\n## Question\nSummarize the quarterly results`,
			);
			expect(outcome.turn.sources).toBeUndefined();
		});

		it("should run retrieval and tools together for an ambiguous question", async () => {
			const { runtime, backend, weather } = createHarness();
			await runtime.engine.ingest({ bytes: bytes("The forecast section of my report covers Shanghai."), sourceName: "r.txt" });

			const outcome = await runtime.orchestrator.handleTurn({
				message: "Compare the weather in Shanghai with the forecast in my report",
			});

			expect(outcome.trace).toEqual(["RECEIVED", "CLASSIFIED", "BOTH", "SYNTHESIZING", "DELIVERED"]);
			expect(outcome.classification?.intent).toBe("ambiguous");
			expect(weather.lookups).toEqual(["Shanghai"]);
			expect(outcome.retrieved).not.toBeNull();
			expect(backend.lastPrompt).toContain("## Retrieved context");
			expect(backend.lastPrompt).toContain("## Tool results");
		});

		it("should skip retrieval when it is turned off for the turn", async () => {
			const { runtime, backend } = createHarness();
			await runtime.engine.ingest({ bytes: bytes(FACT), sourceName: "report.txt" });

			const outcome = await runtime.orchestrator.handleTurn({ message: CAPITAL_QUESTION, retrieval: false });

			expect(outcome.trace).toEqual(["RECEIVED", "CLASSIFIED", "SYNTHESIZING", "DELIVERED"]);
			expect(outcome.retrieved).toBeNull();
			expect(backend.lastPrompt).toBe(`## Question\n${CAPITAL_QUESTION}`);
			expect(backend.calls[0].request.system).toBe(CHAT_SYSTEM_PROMPT);
		});

		it("should pass a note to the model when a weather question lacks a location", async () => {
			const { runtime, backend, weather } = createHarness();

			await runtime.orchestrator.handleTurn({ message: "今天天气怎么样" });

			expect(weather.lookups).toEqual([]);
			expect(backend.lastPrompt).toContain(
				"## Notes\n- The question looks like a query_weather request, but its arguments could not be determined.",
			);
		});
	});

	describe("degraded paths", () => {
		it("should deliver an answer when the tool fails", async () => {
			const { runtime, backend } = createHarness({
				weather: new FakeWeatherProvider(new ToolUnavailableError("Weather service unreachable: down", "query_weather")),
			});

			const outcome = await runtime.orchestrator.handleTurn({ message: "What's the weather in Beijing?" });

			expect(outcome.state).toBe("DELIVERED");
			expect(outcome.toolInvocations[0].outcome).toEqual({
				ok: false,
				error: { code: "TOOL_UNAVAILABLE", message: "Weather service unreachable: down" },
			});
			expect(backend.lastPrompt).toContain("failed (TOOL_UNAVAILABLE): Weather service unreachable: down");
		});

		it("should record a tool timeout and carry on", async () => {
			const { runtime } = createHarness({ weather: new FakeWeatherProvider("hang") }, (config) => {
				config.agent.toolTimeoutMs = 20;
			});

			const outcome = await runtime.orchestrator.handleTurn({ message: "What's the weather in Beijing?" });

			expect(outcome.state).toBe("DELIVERED");
			expect(outcome.toolInvocations[0].outcome).toEqual({
				ok: false,
				error: { code: "TOOL_TIMEOUT", message: "query_weather did not respond within 20ms" },
			});
		});

		it("should answer without context when retrieval fails", async () => {
			const { runtime, backend } = createHarness();
			await runtime.engine.ingest({ bytes: bytes(FACT), sourceName: "report.txt" });
			runtime.embeddings.register({
				id: "local-hash",
				dimensions: 512,
				maxBatchSize: 8,
				embedBatch: async () => {
					throw new Error("backend down");
				},
			});

			const outcome = await runtime.orchestrator.handleTurn({ message: CAPITAL_QUESTION });

			expect(outcome.state).toBe("DELIVERED");
			expect(outcome.retrieved).toEqual([]);
			expect(backend.lastPrompt).toContain(
				"- Document retrieval failed (Embedding with local-hash failed: backend down); answering without document context.",
			);
		});

		it("should answer without context when retrieval times out", async () => {
			const { runtime, backend } = createHarness({}, (config) => {
				config.agent.retrievalTimeoutMs = 20;
			});
			await runtime.engine.ingest({ bytes: bytes(FACT), sourceName: "report.txt" });
			runtime.embeddings.register({
				id: "local-hash",
				dimensions: 512,
				maxBatchSize: 8,
				embedBatch: async (_texts, signal) => waitForAbort(signal),
			});

			const outcome = await runtime.orchestrator.handleTurn({ message: CAPITAL_QUESTION });

			expect(outcome.state).toBe("DELIVERED");
			expect(backend.lastPrompt).toContain(
				"- Document retrieval timed out after 20ms; answering without document context.",
			);
		});
	});

	describe("failures", () => {
		it("should append a failed turn when generation times out", async () => {
			const { runtime } = createHarness({ replies: ["hang"] }, (config) => {
				config.generation.timeoutMs = 30;
			});

			const outcome = await runtime.orchestrator.handleTurn({ message: "Summarize the quarterly results" });

			expect(outcome.state).toBe("FAILED");
			expect(outcome.trace).toEqual(["RECEIVED", "CLASSIFIED", "RETRIEVING", "SYNTHESIZING", "FAILED"]);
			expect(outcome.turn).toMatchObject({
				role: "assistant",
				status: "failed",
				modelId: "qwen3:8b",
				text: "Sorry, I could not answer that: Model qwen3:8b did not finish within 30ms",
				error: { code: "GENERATION_TIMEOUT", message: "Model qwen3:8b did not finish within 30ms" },
			});
			expect(runtime.conversation.all().map((t) => [t.role, t.status])).toEqual([
				["user", "ok"],
				["assistant", "failed"],
			]);
		});

		it("should fail the turn for an unknown model", async () => {
			const { runtime, backend } = createHarness();

			const outcome = await runtime.orchestrator.handleTurn({ message: "hi", modelId: "gpt-9" });

			expect(outcome.trace).toEqual(["RECEIVED", "FAILED"]);
			expect(outcome.turn.error?.code).toBe("INVALID_CONFIGURATION");
			expect(backend.calls).toHaveLength(0);
		});

		it("should fail the turn as cancelled when the caller aborts", async () => {
			const { runtime } = createHarness({ replies: ["hang"] });
			const controller = new AbortController();

			const pending = runtime.orchestrator.handleTurn({
				message: "Summarize the quarterly results",
				signal: controller.signal,
				onStateChange: (state) => {
					if (state === "SYNTHESIZING") setTimeout(() => controller.abort(), 5);
				},
			});
			const outcome = await pending;

			expect(outcome.state).toBe("FAILED");
			expect(outcome.turn.error).toEqual({
				code: "GENERATION_CANCELLED",
				message: "Generation with qwen3:8b was cancelled",
			});
		});

		it("should keep tool results on a turn cancelled after the tools ran", async () => {
			const controller = new AbortController();
			const { runtime, weather } = createHarness({ weather: new AbortingWeatherProvider(controller) });

			const outcome = await runtime.orchestrator.handleTurn({
				message: "What's the weather in Beijing?",
				signal: controller.signal,
			});

			expect(outcome.state).toBe("FAILED");
			expect(outcome.turn.error?.code).toBe("GENERATION_CANCELLED");
			expect(weather.lookups).toEqual(["Beijing"]);
			expect(outcome.toolInvocations.map((r) => r.toolName)).toEqual(["query_weather"]);
			expect(outcome.turn.toolInvocations).toEqual(outcome.toolInvocations);
		});

		it("should keep failed answers out of later history", async () => {
			const { runtime, backend } = createHarness({ replies: [new Error("boom"), "Second answer."] });

			await runtime.orchestrator.handleTurn({ message: "first question", retrieval: false });
			await runtime.orchestrator.handleTurn({ message: "second question", retrieval: false });

			expect(backend.calls[1].request.history).toEqual([{ role: "user", text: "first question" }]);
		});
	});

	describe("conversation", () => {
		it("should stream only the answer and keep reasoning on the stored turn", async () => {
			const { runtime } = createHarness({ replies: ["<think>check the docs</think>The answer is 42"] });
			const fragments: string[] = [];

			const outcome = await runtime.orchestrator.handleTurn({
				message: "What is the answer?",
				onToken: (fragment) => fragments.push(fragment),
			});

			expect(fragments).toEqual(["The ", "answer ", "is ", "42"]);
			expect(outcome.turn.text).toBe("The answer is 42");
			expect(outcome.turn.reasoning).toBe("check the docs");
		});

		it("should feed earlier turns back as history", async () => {
			const { runtime, backend } = createHarness({ replies: ["First answer.", "Second answer."] });

			await runtime.orchestrator.handleTurn({ message: "first question", retrieval: false });
			await runtime.orchestrator.handleTurn({ message: "second question", retrieval: false });

			expect(backend.calls[0].request.history).toEqual([]);
			expect(backend.calls[1].request.history).toEqual([
				{ role: "user", text: "first question" },
				{ role: "assistant", text: "First answer." },
			]);
		});

		it("should bound history to the configured window", async () => {
			const { runtime, backend } = createHarness({}, (config) => {
				config.agent.historyTurns = 1;
			});

			await runtime.orchestrator.handleTurn({ message: "one", retrieval: false });
			await runtime.orchestrator.handleTurn({ message: "two", retrieval: false });

			expect(backend.calls[1].request.history).toEqual([{ role: "assistant", text: "The answer." }]);
		});

		it("should let each turn pick its own model", async () => {
			const { runtime, backend, cache } = createHarness();
			await runtime.engine.ingest({ bytes: bytes(FACT), sourceName: "report.txt" });
			const stats = runtime.engine.stats();
			const documents = runtime.engine.listDocuments();
			const entries = runtime.engine.index.entries();
			const cached = [...cache.entries.keys()];

			const first = await runtime.orchestrator.handleTurn({ message: CAPITAL_QUESTION, modelId: "deepseek-r1:1.5b" });
			const second = await runtime.orchestrator.handleTurn({ message: CAPITAL_QUESTION });

			expect(backend.calls.map((c) => c.model)).toEqual(["deepseek-r1:1.5b", "qwen3:8b"]);
			expect(first.turn.modelId).toBe("deepseek-r1:1.5b");
			expect(second.turn.modelId).toBe("qwen3:8b");
			expect(second.retrieved).toEqual(first.retrieved);
			expect(runtime.engine.stats()).toEqual(stats);
			expect(runtime.engine.listDocuments()).toEqual(documents);
			expect(runtime.engine.index.entries()).toEqual(entries);
			expect([...cache.entries.keys()]).toEqual(cached);
			expect(cache.stores).toBe(1);
			expect(cache.lookups).toBe(1);
		});

		it("should serialize concurrent turns", async () => {
			const { runtime } = createHarness();

			await Promise.all([
				runtime.orchestrator.handleTurn({ message: "first", retrieval: false }),
				runtime.orchestrator.handleTurn({ message: "second", retrieval: false }),
			]);

			expect(runtime.conversation.all().map((t) => `${t.role}:${t.text}`)).toEqual([
				"user:first",
				"assistant:The answer.",
				"user:second",
				"assistant:The answer.",
			]);
		});

		it("should report every state change", async () => {
			const { runtime } = createHarness();
			const states: TurnState[] = [];

			await runtime.orchestrator.handleTurn({ message: "hello", onStateChange: (state) => states.push(state) });

			expect(states).toEqual(["RECEIVED", "CLASSIFIED", "RETRIEVING", "SYNTHESIZING", "DELIVERED"]);
		});
	});
});
