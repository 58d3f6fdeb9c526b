/**
 * Language Model Types
 *
 * Capability contract shared by every generation backend.
 */

/**
 * One prior message fed back to the model
 */
export interface ChatMessage {
	role: "user" | "assistant";
	text: string;
}

/**
 * A single generation call
 */
export interface GenerationRequest {
	prompt: string;
	system?: string;
	/** Earlier turns, oldest first */
	history?: ChatMessage[];
	/** Caller cancellation */
	signal?: AbortSignal;
	/** Overrides the configured generation budget */
	timeoutMs?: number;
}

/**
 * Backend kinds a generation model can be served by
 */
export type GenerationBackendKind = "ollama" | "ollama-cli";

/**
 * One way of talking to a model runtime
 *
 * Backends only report failures; timeouts, cancellation and error
 * classification are applied by LanguageModelRegistry.
 */
export interface GenerationBackend {
	readonly kind: GenerationBackendKind;
	generate(model: string, request: GenerationRequest): Promise<string>;
	/** Text fragments in order; concatenated they form the full answer */
	stream(model: string, request: GenerationRequest): AsyncIterable<string>;
}
