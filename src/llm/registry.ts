/**
 * Language Model Registry
 *
 * Maps configured generation model ids to a backend and backend model name.
 * Every call gets its own time budget and honours the caller's signal:
 *
 * - budget elapsed → GenerationTimeoutError
 * - caller aborted → GenerationCancelledError
 * - anything else from the backend → GenerationUnavailableError
 *
 * Nothing is retried. Switching model id between calls is always legal.
 */

import type { AgentConfig, GenerationModelConfig } from "../config.js";
import { abortable } from "../concurrency.js";
import {
	AppError,
	GenerationCancelledError,
	GenerationTimeoutError,
	GenerationUnavailableError,
	InvalidConfigurationError,
	errorMessage,
} from "../errors.js";
import { llmLogger } from "../logger.js";
import { OllamaCliBackend } from "./ollama-cli.js";
import { OllamaHttpBackend } from "./ollama-http.js";
import type { GenerationBackend, GenerationBackendKind, GenerationRequest } from "./types.js";

const logger = llmLogger.child({ component: "registry" });

export type GenerationBackends = Partial<Record<GenerationBackendKind, GenerationBackend>>;

/**
 * A configured model bound to the backend that serves it
 */
export interface ResolvedModel {
	config: GenerationModelConfig;
	backend: GenerationBackend;
	/** Name the backend knows the model by */
	model: string;
}

/**
 * Budget and cancellation state for one call
 */
class GenerationRun {
	readonly controller = new AbortController();
	private timedOut = false;
	private readonly timer: NodeJS.Timeout;
	private readonly onParentAbort = (): void => this.controller.abort(this.parent?.reason);

	constructor(
		readonly modelId: string,
		readonly timeoutMs: number,
		private readonly parent?: AbortSignal,
	) {
		this.timer = setTimeout(() => {
			this.timedOut = true;
			this.controller.abort(new Error(`generation timed out after ${timeoutMs}ms`));
		}, timeoutMs);

		if (parent?.aborted) {
			this.controller.abort(parent.reason);
		} else {
			parent?.addEventListener("abort", this.onParentAbort, { once: true });
		}
	}

	get signal(): AbortSignal {
		return this.controller.signal;
	}

	toGenerationError(error: unknown): AppError {
		if (this.timedOut) {
			return new GenerationTimeoutError(
				`Model ${this.modelId} did not finish within ${this.timeoutMs}ms`,
				this.modelId,
				this.timeoutMs,
			);
		}
		if (this.signal.aborted) {
			return new GenerationCancelledError(`Generation with ${this.modelId} was cancelled`, this.modelId);
		}
		if (error instanceof AppError) {
			return error;
		}
		return new GenerationUnavailableError(errorMessage(error), this.modelId);
	}

	dispose(): void {
		clearTimeout(this.timer);
		this.parent?.removeEventListener("abort", this.onParentAbort);
	}
}

export class LanguageModelRegistry {
	private readonly backends: Map<GenerationBackendKind, GenerationBackend>;
	private readonly models: Map<string, GenerationModelConfig>;

	constructor(
		private readonly config: Pick<AgentConfig, "generation" | "ollamaBaseUrl">,
		backends: GenerationBackends = {},
	) {
		this.backends = new Map<GenerationBackendKind, GenerationBackend>([
			["ollama", backends.ollama ?? new OllamaHttpBackend(config.ollamaBaseUrl)],
			["ollama-cli", backends["ollama-cli"] ?? new OllamaCliBackend()],
		]);
		this.models = new Map(config.generation.models.map((m) => [m.id, m]));
	}

	get defaultModelId(): string {
		return this.config.generation.defaultModel;
	}

	list(): GenerationModelConfig[] {
		return [...this.models.values()];
	}

	has(modelId: string): boolean {
		return this.models.has(modelId);
	}

	/**
	 * @throws InvalidConfigurationError for an unknown model id
	 */
	resolve(modelId: string): ResolvedModel {
		const config = this.models.get(modelId);
		if (!config) {
			throw new InvalidConfigurationError(
				`Unknown generation model "${modelId}" (available: ${[...this.models.keys()].join(", ")})`,
				"modelId",
			);
		}
		const backend = this.backends.get(config.backend);
		if (!backend) {
			throw new InvalidConfigurationError(`No backend registered for "${config.backend}"`, "backend");
		}
		return { config, backend, model: config.model ?? config.id };
	}

	/**
	 * Complete answer in one piece
	 */
	async generate(modelId: string, request: GenerationRequest): Promise<string> {
		const { backend, model } = this.resolve(modelId);
		const run = this.start(modelId, request);
		try {
			const text = await abortable(backend.generate(model, { ...request, signal: run.signal }), run.signal);
			logger.debug({ modelId, chars: text.length }, "Generation complete");
			return text;
		} catch (error) {
			throw this.fail(run, error);
		} finally {
			run.dispose();
		}
	}

	/**
	 * Answer as text fragments; the budget covers the whole stream
	 */
	async *stream(modelId: string, request: GenerationRequest): AsyncGenerator<string> {
		const { backend, model } = this.resolve(modelId);
		const run = this.start(modelId, request);
		const iterator = backend.stream(model, { ...request, signal: run.signal })[Symbol.asyncIterator]();

		// False when the consumer stops early and the backend must be closed
		let settled = false;
		try {
			while (true) {
				const next = await abortable(iterator.next(), run.signal);
				if (next.done) {
					settled = true;
					break;
				}
				yield next.value;
			}
		} catch (error) {
			settled = true;
			throw this.fail(run, error);
		} finally {
			run.dispose();
			if (!settled) {
				run.controller.abort(new Error("stream closed by consumer"));
				await iterator.return?.();
			}
		}
	}

	private start(modelId: string, request: GenerationRequest): GenerationRun {
		const timeoutMs = request.timeoutMs ?? this.config.generation.timeoutMs;
		logger.debug({ modelId, timeoutMs, historyTurns: request.history?.length ?? 0 }, "Generation started");
		return new GenerationRun(modelId, timeoutMs, request.signal);
	}

	private fail(run: GenerationRun, error: unknown): AppError {
		const mapped = run.toGenerationError(error);
		logger.warn({ modelId: run.modelId, code: mapped.code, error: mapped.message }, "Generation failed");
		return mapped;
	}
}
