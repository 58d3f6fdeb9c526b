/**
 * Ollama generation over HTTP through the AI SDK
 */

import { generateText, type ModelMessage, streamText } from "ai";
import { GenerationUnavailableError } from "../errors.js";
import { llmLogger } from "../logger.js";
import { describeOllamaFailure, getOllamaClient } from "../ollama-client.js";
import type { GenerationBackend, GenerationRequest } from "./types.js";

const logger = llmLogger.child({ component: "ollama-http" });

/**
 * History plus the new prompt, in AI SDK message form
 */
export function toModelMessages(request: GenerationRequest): ModelMessage[] {
	const messages: ModelMessage[] = (request.history ?? []).map((m) =>
		m.role === "user" ? { role: "user", content: m.text } : { role: "assistant", content: m.text },
	);
	messages.push({ role: "user", content: request.prompt });
	return messages;
}

export class OllamaHttpBackend implements GenerationBackend {
	readonly kind = "ollama";

	constructor(private readonly baseUrl: string) {}

	async generate(model: string, request: GenerationRequest): Promise<string> {
		try {
			const result = await generateText({
				model: getOllamaClient(this.baseUrl)(model),
				system: request.system,
				messages: toModelMessages(request),
				// Retry policy belongs to the caller
				maxRetries: 0,
				abortSignal: request.signal,
			});
			return result.text;
		} catch (error) {
			throw this.wrap(error, model, request.signal);
		}
	}

	async *stream(model: string, request: GenerationRequest): AsyncGenerator<string> {
		const result = streamText({
			model: getOllamaClient(this.baseUrl)(model),
			system: request.system,
			messages: toModelMessages(request),
			maxRetries: 0,
			abortSignal: request.signal,
			onError: ({ error }) => {
				logger.debug({ model, error: String(error) }, "Stream reported an error");
			},
		});

		try {
			for await (const part of result.fullStream) {
				switch (part.type) {
					case "text-delta":
						yield part.text;
						break;
					case "error":
						throw part.error;
				}
			}
		} catch (error) {
			throw this.wrap(error, model, request.signal);
		}
	}

	private wrap(error: unknown, model: string, signal?: AbortSignal): unknown {
		if (signal?.aborted) {
			return error;
		}
		return new GenerationUnavailableError(describeOllamaFailure(error, this.baseUrl, model), model);
	}
}
