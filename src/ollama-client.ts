/**
 * Shared Ollama provider construction for embedding and generation backends
 */

import { createOllama, type OllamaProvider } from "ollama-ai-provider-v2";

export const OLLAMA_DEFAULT_BASE = "http://127.0.0.1:11434";

/**
 * Normalize an Ollama base URL for ollama-ai-provider-v2, which expects the
 * `/api` suffix (e.g. http://localhost:11434/api)
 */
export function normalizeOllamaBaseUrl(baseUrl: string): string {
	let normalized = baseUrl.replace(/\/v1\/?$/, "").replace(/\/+$/, "");
	if (!normalized.endsWith("/api")) {
		normalized = `${normalized}/api`;
	}
	return normalized;
}

const clients = new Map<string, OllamaProvider>();

/**
 * One provider instance per base URL
 */
export function getOllamaClient(baseUrl: string = OLLAMA_DEFAULT_BASE): OllamaProvider {
	const normalized = normalizeOllamaBaseUrl(baseUrl);
	let client = clients.get(normalized);
	if (!client) {
		client = createOllama({ baseURL: normalized });
		clients.set(normalized, client);
	}
	return client;
}

/**
 * Turn a raw backend failure into a one-line hint about what to check
 */
export function describeOllamaFailure(error: unknown, baseUrl: string, model: string): string {
	const message = error instanceof Error ? error.message : String(error);
	const lower = message.toLowerCase();
	if (lower.includes("econnrefused") || lower.includes("fetch failed") || lower.includes("cannot connect")) {
		return `Cannot reach Ollama at ${baseUrl}; is \`ollama serve\` running? (${message})`;
	}
	if (lower.includes("not found") || lower.includes("404")) {
		return `Model ${model} is not available in Ollama; try \`ollama pull ${model}\` (${message})`;
	}
	return `Ollama request for ${model} failed: ${message}`;
}
