/**
 * Agent Orchestrator: one user turn through the answer pipeline
 *
 * | State         | Action                                                  |
 * |---------------|---------------------------------------------------------|
 * | RECEIVED      | Append the user turn to the conversation                |
 * | CLASSIFIED    | Pick the paths: documents, tools, or both               |
 * | RETRIEVING    | Retrieve chunks (empty → no-context marker)             |
 * | TOOL_INVOKING | Run tool calls, recording every outcome                 |
 * | BOTH          | Retrieval and tools concurrently, each with its budget  |
 * | SYNTHESIZING  | Prompt the selected model, optionally streaming         |
 * | DELIVERED     | Append the assistant turn with tools and sources        |
 * | FAILED        | Append a visible failed assistant turn                  |
 *
 * Turns are serialized. `handleTurn` never throws once the user turn is
 * recorded: every failure ends in FAILED with a turn describing it.
 */

import type { AgentConfig } from "../config.js";
import { AsyncMutex, withTimeout } from "../concurrency.js";
import { AppError, GenerationCancelledError, TimeoutError, errorCode, errorMessage } from "../errors.js";
import type { LanguageModelRegistry } from "../llm/registry.js";
import type { GenerationRequest } from "../llm/types.js";
import { agentLogger } from "../logger.js";
import type { Retriever } from "../rag/retriever.js";
import type { RetrievedChunk } from "../rag/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolCall, ToolInvocationRecord } from "../tools/types.js";
import type { Classification, IntentClassifier } from "./classifier.js";
import type { ConversationState, ConversationTurn, SourceReference } from "./conversation.js";
import {
	buildSynthesisPrompt,
	CHAT_SYSTEM_PROMPT,
	RAG_SYSTEM_PROMPT,
	ReasoningFilter,
	splitReasoning,
} from "./prompt.js";

const logger = agentLogger.child({ component: "orchestrator" });

// =============================================================================
// Types
// =============================================================================

export type TurnState =
	| "RECEIVED"
	| "CLASSIFIED"
	| "RETRIEVING"
	| "TOOL_INVOKING"
	| "BOTH"
	| "SYNTHESIZING"
	| "DELIVERED"
	| "FAILED";

export interface TurnRequest {
	message: string;
	/** Generation model id; the configured default when omitted */
	modelId?: string;
	/** Overrides `retrieval.enabled` for this turn */
	retrieval?: boolean;
	signal?: AbortSignal;
	/** Receives answer fragments as they arrive; enables streaming */
	onToken?: (fragment: string) => void;
	onStateChange?: (state: TurnState) => void;
}

export interface TurnOutcome {
	state: "DELIVERED" | "FAILED";
	/** States visited, in order */
	trace: TurnState[];
	/** The assistant turn appended for this request */
	turn: ConversationTurn;
	userTurn: ConversationTurn;
	classification: Classification | null;
	toolInvocations: ToolInvocationRecord[];
	/** Null when retrieval did not run */
	retrieved: RetrievedChunk[] | null;
}

export interface AgentOrchestratorOptions {
	config: Pick<AgentConfig, "retrieval" | "agent">;
	retriever: Retriever;
	models: LanguageModelRegistry;
	tools: ToolRegistry;
	classifier: IntentClassifier;
	conversation: ConversationState;
}

/**
 * Mutable record of one turn's progress
 */
interface TurnContext {
	request: TurnRequest;
	modelId: string;
	trace: TurnState[];
	classification: Classification | null;
	retrieved: RetrievedChunk[] | null;
	toolInvocations: ToolInvocationRecord[];
	notes: string[];
}

// =============================================================================
// Orchestrator
// =============================================================================

export class AgentOrchestrator {
	private readonly turnLock = new AsyncMutex();

	constructor(private readonly options: AgentOrchestratorOptions) {}

	get conversation(): ConversationState {
		return this.options.conversation;
	}

	/**
	 * Answer one message; waits for any turn already in progress
	 */
	async handleTurn(request: TurnRequest): Promise<TurnOutcome> {
		return this.turnLock.runExclusive(() => this.runTurn(request));
	}

	private async runTurn(request: TurnRequest): Promise<TurnOutcome> {
		const { conversation, models } = this.options;
		const ctx: TurnContext = {
			request,
			modelId: request.modelId ?? models.defaultModelId,
			trace: [],
			classification: null,
			retrieved: null,
			toolInvocations: [],
			notes: [],
		};

		this.enter(ctx, "RECEIVED");
		const userTurn = conversation.append({ role: "user", text: request.message, status: "ok" });

		try {
			models.resolve(ctx.modelId);
			const history = conversation.historyWindow(this.options.config.agent.historyTurns, userTurn.id);

			const classification = await this.options.classifier.classify(request.message);
			ctx.classification = classification;
			ctx.notes.push(...classification.notes);
			this.enter(ctx, "CLASSIFIED");

			const retrievalEnabled = request.retrieval ?? this.options.config.retrieval.enabled;
			await this.gather(ctx, retrievalEnabled);

			this.enter(ctx, "SYNTHESIZING");
			const raw = await this.synthesize(ctx, {
				prompt: buildSynthesisPrompt({
					question: request.message,
					retrieved: ctx.retrieved,
					toolInvocations: ctx.toolInvocations,
					notes: ctx.notes,
				}),
				system: retrievalEnabled ? RAG_SYSTEM_PROMPT : CHAT_SYSTEM_PROMPT,
				history,
				signal: request.signal,
			});
			const { answer, reasoning } = splitReasoning(raw);

			const turn = conversation.append({
				role: "assistant",
				text: answer,
				status: "ok",
				modelId: ctx.modelId,
				...(reasoning ? { reasoning } : {}),
				...(ctx.toolInvocations.length > 0 ? { toolInvocations: ctx.toolInvocations } : {}),
				...(ctx.retrieved?.length ? { sources: toSources(ctx.retrieved) } : {}),
			});
			this.enter(ctx, "DELIVERED");
			logger.info(
				{ modelId: ctx.modelId, trace: ctx.trace, tools: ctx.toolInvocations.length, sources: ctx.retrieved?.length ?? 0 },
				"Turn delivered",
			);
			return this.outcome(ctx, "DELIVERED", turn, userTurn);
		} catch (caught) {
			const error =
				request.signal?.aborted && !(caught instanceof AppError)
					? new GenerationCancelledError("The turn was cancelled", ctx.modelId)
					: caught;
			const turn = conversation.append({
				role: "assistant",
				text: `Sorry, I could not answer that: ${errorMessage(error)}`,
				status: "failed",
				modelId: ctx.modelId,
				error: { code: errorCode(error), message: errorMessage(error) },
				...(ctx.toolInvocations.length > 0 ? { toolInvocations: ctx.toolInvocations } : {}),
			});
			this.enter(ctx, "FAILED");
			logger.warn({ modelId: ctx.modelId, trace: ctx.trace, code: errorCode(error), error: errorMessage(error) }, "Turn failed");
			return this.outcome(ctx, "FAILED", turn, userTurn);
		}
	}

	/**
	 * Run the retrieval and tool paths the classification asks for
	 */
	private async gather(ctx: TurnContext, retrievalEnabled: boolean): Promise<void> {
		const classification = ctx.classification;
		const toolCalls = classification && classification.intent !== "document" ? classification.toolCalls : [];
		const retrieve = retrievalEnabled && classification?.intent !== "tool";
		const invoke = toolCalls.length > 0;

		if (retrieve && invoke) {
			this.enter(ctx, "BOTH");
		} else if (retrieve) {
			this.enter(ctx, "RETRIEVING");
		} else if (invoke) {
			this.enter(ctx, "TOOL_INVOKING");
		} else {
			return;
		}

		const [retrieved] = await Promise.all([
			retrieve ? this.retrieve(ctx) : Promise.resolve(null),
			invoke ? this.invokeTools(ctx, toolCalls) : Promise.resolve(),
		]);
		ctx.retrieved = retrieved;
	}

	/**
	 * Retrieval under its own budget; failures degrade to no context
	 */
	private async retrieve(ctx: TurnContext): Promise<RetrievedChunk[]> {
		const { retrieval, agent } = this.options.config;
		const { message, signal } = ctx.request;
		try {
			return await withTimeout(
				"retrieval",
				agent.retrievalTimeoutMs,
				(pathSignal) =>
					this.options.retriever.retrieve(message, { k: retrieval.topK, minScore: retrieval.minScore, signal: pathSignal }),
				signal,
			);
		} catch (error) {
			if (signal?.aborted) {
				throw error;
			}
			const note =
				error instanceof TimeoutError
					? `Document retrieval timed out after ${agent.retrievalTimeoutMs}ms; answering without document context.`
					: `Document retrieval failed (${errorMessage(error)}); answering without document context.`;
			ctx.notes.push(note);
			logger.warn({ code: errorCode(error), error: errorMessage(error) }, "Retrieval degraded to empty");
			return [];
		}
	}

	/**
	 * Records land on the context before a cancel is honoured, so a failed
	 * turn still shows the calls that ran
	 */
	private async invokeTools(ctx: TurnContext, calls: ToolCall[]): Promise<void> {
		const { signal } = ctx.request;
		const timeoutMs = this.options.config.agent.toolTimeoutMs;
		ctx.toolInvocations = await Promise.all(calls.map((call) => this.options.tools.run(call, { timeoutMs, signal })));
		signal?.throwIfAborted();
	}

	private async synthesize(ctx: TurnContext, request: GenerationRequest): Promise<string> {
		const { models } = this.options;
		const onToken = ctx.request.onToken;
		if (!onToken) {
			return models.generate(ctx.modelId, request);
		}

		const filter = new ReasoningFilter();
		let raw = "";
		for await (const fragment of models.stream(ctx.modelId, request)) {
			raw += fragment;
			const visible = filter.push(fragment);
			if (visible) onToken(visible);
		}
		const rest = filter.flush();
		if (rest) onToken(rest);
		return raw;
	}

	private enter(ctx: TurnContext, state: TurnState): void {
		ctx.trace.push(state);
		logger.debug({ state }, "Turn state");
		ctx.request.onStateChange?.(state);
	}

	private outcome(
		ctx: TurnContext,
		state: TurnOutcome["state"],
		turn: ConversationTurn,
		userTurn: ConversationTurn,
	): TurnOutcome {
		return {
			state,
			trace: [...ctx.trace],
			turn,
			userTurn,
			classification: ctx.classification,
			toolInvocations: ctx.toolInvocations,
			retrieved: ctx.retrieved,
		};
	}
}

function toSources(retrieved: RetrievedChunk[]): SourceReference[] {
	return retrieved.map((item) => ({ sourceName: item.sourceName, chunkId: item.chunk.id, score: item.score }));
}
