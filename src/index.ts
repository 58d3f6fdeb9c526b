/**
 * Local RAG Agent - Centralized Export Module
 *
 * Single entry point for embedding the agent in another program:
 * - Configuration loading and the composition root
 * - Ingestion, vector index and retrieval
 * - Embedding and generation provider abstractions
 * - Tools and the agent orchestrator
 */

// Agent
export {
	type Classification,
	type Intent,
	type IntentClassifier,
	RuleBasedIntentClassifier,
	type ToolRule,
} from "./agent/classifier.js";
export { type ConversationTurn, ConversationState, type SourceReference } from "./agent/conversation.js";
export {
	AgentOrchestrator,
	type AgentOrchestratorOptions,
	type TurnOutcome,
	type TurnRequest,
	type TurnState,
} from "./agent/orchestrator.js";
export { buildSynthesisPrompt, NO_CONTEXT_MARKER, splitReasoning } from "./agent/prompt.js";
// Configuration
export { type AgentConfig, getDefaultConfig, loadConfig, parseConfig } from "./config.js";
// Errors
export * from "./errors.js";
// Language models
export { type GenerationBackends, LanguageModelRegistry } from "./llm/registry.js";
export type { ChatMessage, GenerationBackend, GenerationRequest } from "./llm/types.js";
// Logging
export { logger } from "./logger.js";
// Retrieval-augmented generation
export { BoundaryChunker, type Chunker, chunkText } from "./rag/chunker.js";
export {
	type EmbeddingProvider,
	EmbeddingProviderRegistry,
	embedTexts,
	HashingEmbeddingProvider,
	OllamaEmbeddingProvider,
} from "./rag/embedder.js";
export { RagEngine, type RagEngineOptions, type SwitchModelResult } from "./rag/engine.js";
export { FileIngestionCache, type IngestionCache } from "./rag/ingestion-cache.js";
export { Retriever } from "./rag/retriever.js";
export type * from "./rag/types.js";
export { VectorIndex } from "./rag/vector-index.js";
// Runtime
export { createRuntime, type Runtime, type RuntimeOverrides } from "./runtime.js";
// Tools
export { ToolRegistry } from "./tools/registry.js";
export { defineTool, type ToolCapability, type ToolInvocationRecord } from "./tools/types.js";
export { AmapWeatherProvider, createWeatherTool, type WeatherProvider, type WeatherReport } from "./tools/weather.js";
