/**
 * Runtime
 *
 * Composition root: one validated configuration in, every component wired
 * together out. Nothing below this point reads configuration from anywhere
 * else.
 */

import { join } from "node:path";
import { RuleBasedIntentClassifier, type IntentClassifier } from "./agent/classifier.js";
import { ConversationState } from "./agent/conversation.js";
import { AgentOrchestrator } from "./agent/orchestrator.js";
import type { AgentConfig } from "./config.js";
import { CACHE_DIR_NAME, HISTORY_FILE_NAME } from "./constants.js";
import { type GenerationBackends, LanguageModelRegistry } from "./llm/registry.js";
import { logger } from "./logger.js";
import { EmbeddingProviderRegistry, type EmbeddingProvider } from "./rag/embedder.js";
import { RagEngine } from "./rag/engine.js";
import { FileIngestionCache, type IngestionCache } from "./rag/ingestion-cache.js";
import { Retriever } from "./rag/retriever.js";
import { ToolRegistry } from "./tools/registry.js";
import { AmapWeatherProvider, createWeatherTool, type WeatherProvider, weatherToolRule } from "./tools/weather.js";

export interface Runtime {
	config: AgentConfig;
	embeddings: EmbeddingProviderRegistry;
	engine: RagEngine;
	retriever: Retriever;
	models: LanguageModelRegistry;
	tools: ToolRegistry;
	conversation: ConversationState;
	orchestrator: AgentOrchestrator;
}

/**
 * Replacements for the components that reach outside the process
 */
export interface RuntimeOverrides {
	embeddingProviders?: EmbeddingProvider[];
	generationBackends?: GenerationBackends;
	weatherProvider?: WeatherProvider;
	cache?: IngestionCache;
	classifier?: IntentClassifier;
	/** Keep index and history in memory only */
	inMemory?: boolean;
}

export function createRuntime(config: AgentConfig, overrides: RuntimeOverrides = {}): Runtime {
	const embeddings = new EmbeddingProviderRegistry(config);
	for (const provider of overrides.embeddingProviders ?? []) {
		embeddings.register(provider);
	}

	const engineOptions = {
		config,
		embeddings,
		cache: overrides.cache ?? new FileIngestionCache(join(config.stateDir, CACHE_DIR_NAME)),
		...(overrides.inMemory ? { indexPath: null } : {}),
	};
	const engine = overrides.inMemory ? new RagEngine(engineOptions) : RagEngine.open(engineOptions);
	const retriever = new Retriever(engine);

	const models = new LanguageModelRegistry(config, overrides.generationBackends);

	const weatherProvider =
		overrides.weatherProvider ?? new AmapWeatherProvider({ apiKey: config.weather.apiKey, baseUrl: config.weather.baseUrl });
	const tools = new ToolRegistry([createWeatherTool(weatherProvider)]);

	const conversation = overrides.inMemory
		? new ConversationState(null)
		: ConversationState.load(join(config.stateDir, HISTORY_FILE_NAME));

	const orchestrator = new AgentOrchestrator({
		config,
		retriever,
		models,
		tools,
		classifier: overrides.classifier ?? new RuleBasedIntentClassifier([weatherToolRule]),
		conversation,
	});

	logger.debug(
		{ stateDir: config.stateDir, embeddingModel: engine.embeddingModelId, generationModel: models.defaultModelId },
		"Runtime ready",
	);

	return { config, embeddings, engine, retriever, models, tools, conversation, orchestrator };
}
