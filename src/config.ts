/**
 * Configuration File Support
 *
 * Loads the agent configuration from .ragagentrc (JSON format) and the
 * environment, validates it with zod, and returns one frozen AgentConfig that
 * is handed to every component constructor.
 *
 * Configuration is loaded from (in order of precedence, highest first):
 * 1. Explicit overrides (CLI flags)
 * 2. Environment variables
 * 3. .ragagentrc in current directory
 * 4. .ragagentrc in home directory
 * 5. Built-in defaults
 *
 * Objects are merged key by key; arrays (model lists) replace the lower layer.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import {
	DEFAULT_CHUNK_MAX_SIZE,
	DEFAULT_CHUNK_OVERLAP,
	DEFAULT_EMBEDDING_BATCH_SIZE,
	DEFAULT_HISTORY_TURNS,
	DEFAULT_RETRIEVAL_MIN_SCORE,
	DEFAULT_RETRIEVAL_TOP_K,
	DEFAULT_STATE_DIR,
	HASHING_EMBEDDING_DIMENSIONS,
	TIMEOUT_GENERATION_MS,
	TIMEOUT_RETRIEVAL_MS,
	TIMEOUT_TOOL_MS,
} from "./constants.js";
import { InvalidConfigurationError } from "./errors.js";

export const CONFIG_FILE_NAME = ".ragagentrc";

// ============================================================================
// Schema
// ============================================================================

const positiveInt = z.number().int().positive();

export const ChunkingConfigSchema = z
	.object({
		maxSize: positiveInt,
		overlap: positiveInt,
	})
	.refine((c) => c.overlap < c.maxSize, {
		message: "overlap must be smaller than maxSize",
		path: ["overlap"],
	});

export const EmbeddingModelConfigSchema = z.object({
	/** Identity used to scope the index and cache */
	id: z.string().min(1),
	backend: z.enum(["ollama", "hashing"]),
	/** Backend model name (defaults to id) */
	model: z.string().min(1).optional(),
	dimensions: positiveInt,
	batchSize: positiveInt.default(DEFAULT_EMBEDDING_BATCH_SIZE),
});

export const GenerationModelConfigSchema = z.object({
	id: z.string().min(1),
	backend: z.enum(["ollama", "ollama-cli"]),
	model: z.string().min(1).optional(),
});

function uniqueIds(models: Array<{ id: string }>): boolean {
	return new Set(models.map((m) => m.id)).size === models.length;
}

export const AgentConfigSchema = z
	.object({
		stateDir: z.string().min(1),
		ollamaBaseUrl: z.url(),
		chunking: ChunkingConfigSchema,
		retrieval: z.object({
			enabled: z.boolean(),
			topK: positiveInt,
			minScore: z.number().min(-1).max(1),
		}),
		embedding: z.object({
			defaultModel: z.string().min(1),
			models: z.array(EmbeddingModelConfigSchema).min(1).refine(uniqueIds, "embedding model ids must be unique"),
		}),
		generation: z.object({
			defaultModel: z.string().min(1),
			timeoutMs: positiveInt,
			models: z.array(GenerationModelConfigSchema).min(1).refine(uniqueIds, "generation model ids must be unique"),
		}),
		agent: z.object({
			historyTurns: z.number().int().min(0),
			retrievalTimeoutMs: positiveInt,
			toolTimeoutMs: positiveInt,
		}),
		weather: z.object({
			apiKey: z.string().min(1).optional(),
			baseUrl: z.url(),
		}),
	})
	.superRefine((config, ctx) => {
		if (!config.embedding.models.some((m) => m.id === config.embedding.defaultModel)) {
			ctx.addIssue({
				code: "custom",
				path: ["embedding", "defaultModel"],
				message: `unknown embedding model "${config.embedding.defaultModel}"`,
			});
		}
		if (!config.generation.models.some((m) => m.id === config.generation.defaultModel)) {
			ctx.addIssue({
				code: "custom",
				path: ["generation", "defaultModel"],
				message: `unknown generation model "${config.generation.defaultModel}"`,
			});
		}
	});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type EmbeddingModelConfig = z.infer<typeof EmbeddingModelConfigSchema>;
export type GenerationModelConfig = z.infer<typeof GenerationModelConfigSchema>;

// ============================================================================
// Defaults
// ============================================================================

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: AgentConfig = {
	stateDir: DEFAULT_STATE_DIR,
	ollamaBaseUrl: "http://127.0.0.1:11434",
	chunking: {
		maxSize: DEFAULT_CHUNK_MAX_SIZE,
		overlap: DEFAULT_CHUNK_OVERLAP,
	},
	retrieval: {
		enabled: true,
		topK: DEFAULT_RETRIEVAL_TOP_K,
		minScore: DEFAULT_RETRIEVAL_MIN_SCORE,
	},
	embedding: {
		defaultModel: "bge-m3:latest",
		models: [
			{ id: "bge-m3:latest", backend: "ollama", dimensions: 1024, batchSize: DEFAULT_EMBEDDING_BATCH_SIZE },
			{ id: "nomic-embed-text:latest", backend: "ollama", dimensions: 768, batchSize: DEFAULT_EMBEDDING_BATCH_SIZE },
			{ id: "mxbai-embed-large:latest", backend: "ollama", dimensions: 1024, batchSize: DEFAULT_EMBEDDING_BATCH_SIZE },
			{ id: "bge-large-en-v1.5:latest", backend: "ollama", dimensions: 1024, batchSize: DEFAULT_EMBEDDING_BATCH_SIZE },
			{ id: "bge-large-zh-v1.5:latest", backend: "ollama", dimensions: 1024, batchSize: DEFAULT_EMBEDDING_BATCH_SIZE },
			{
				id: "local-hash",
				backend: "hashing",
				dimensions: HASHING_EMBEDDING_DIMENSIONS,
				batchSize: DEFAULT_EMBEDDING_BATCH_SIZE,
			},
		],
	},
	generation: {
		defaultModel: "qwen3:8b",
		timeoutMs: TIMEOUT_GENERATION_MS,
		models: [
			{ id: "qwen3:1.7b", backend: "ollama" },
			{ id: "deepseek-r1:1.5b", backend: "ollama" },
			{ id: "qwen3:8b", backend: "ollama" },
		],
	},
	agent: {
		historyTurns: DEFAULT_HISTORY_TURNS,
		retrievalTimeoutMs: TIMEOUT_RETRIEVAL_MS,
		toolTimeoutMs: TIMEOUT_TOOL_MS,
	},
	weather: {
		baseUrl: "https://restapi.amap.com",
	},
};

/**
 * Get default config values (for documentation and tests)
 */
export function getDefaultConfig(): AgentConfig {
	return structuredClone(DEFAULT_CONFIG);
}

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
	/** Directory searched for the project .ragagentrc (default: process.cwd()) */
	cwd?: string;
	/** Directory searched for the user .ragagentrc (default: os.homedir()) */
	homeDir?: string;
	/** Environment to read overrides from (default: process.env) */
	env?: NodeJS.ProcessEnv;
	/** Highest precedence layer, typically CLI flags */
	overrides?: Record<string, unknown>;
}

export interface LoadedConfig {
	config: Readonly<AgentConfig>;
	/** Config files that contributed, lowest precedence first */
	sources: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` onto `base`. Nested objects merge, everything else
 * (arrays included) replaces. Undefined values in `override` are skipped.
 */
export function deepMerge(base: unknown, override: unknown): unknown {
	if (!isRecord(base) || !isRecord(override)) {
		return override === undefined ? base : override;
	}
	const merged: Record<string, unknown> = { ...base };
	for (const [key, value] of Object.entries(override)) {
		if (value === undefined) continue;
		merged[key] = deepMerge(base[key], value);
	}
	return merged;
}

/**
 * Try to read and parse a config file
 */
function tryReadConfig(filePath: string): Record<string, unknown> | null {
	if (!fs.existsSync(filePath)) {
		return null;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new InvalidConfigurationError(`Invalid JSON in ${filePath}: ${reason}`, filePath);
	}

	if (!isRecord(parsed)) {
		throw new InvalidConfigurationError(`Config in ${filePath} is not an object`, filePath);
	}
	return parsed;
}

/**
 * Environment overrides, as a partial config layer
 */
function envLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
	const layer: Record<string, unknown> = {};
	if (env.RAG_AGENT_STATE_DIR) layer.stateDir = env.RAG_AGENT_STATE_DIR;
	if (env.OLLAMA_BASE_URL) layer.ollamaBaseUrl = env.OLLAMA_BASE_URL;
	if (env.RAG_AGENT_MODEL) layer.generation = { defaultModel: env.RAG_AGENT_MODEL };
	if (env.AMAP_API_KEY) layer.weather = { apiKey: env.AMAP_API_KEY };
	return layer;
}

function deepFreeze<T>(value: T): Readonly<T> {
	if (typeof value === "object" && value !== null) {
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
		Object.freeze(value);
	}
	return value;
}

/**
 * Validate a merged raw configuration
 *
 * @throws InvalidConfigurationError listing every issue
 */
export function parseConfig(raw: unknown): AgentConfig {
	const result = AgentConfigSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
		throw new InvalidConfigurationError(`Invalid configuration:\n  - ${issues.join("\n  - ")}`, "config", issues);
	}
	return result.data;
}

/**
 * Load configuration from defaults, .ragagentrc files, environment and overrides
 *
 * @throws InvalidConfigurationError on malformed files or invalid values
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
	const cwd = options.cwd ?? process.cwd();
	const homeDir = options.homeDir ?? os.homedir();
	const env = options.env ?? process.env;

	let raw: unknown = getDefaultConfig();
	const sources: string[] = [];

	// Home directory first (lower precedence), then the working directory
	for (const filePath of [path.join(homeDir, CONFIG_FILE_NAME), path.join(cwd, CONFIG_FILE_NAME)]) {
		const layer = tryReadConfig(filePath);
		if (layer) {
			raw = deepMerge(raw, layer);
			sources.push(filePath);
		}
	}

	raw = deepMerge(raw, envLayer(env));
	if (options.overrides) {
		raw = deepMerge(raw, options.overrides);
	}

	const config = parseConfig(raw);
	config.stateDir = path.resolve(cwd, config.stateDir);
	return { config: deepFreeze(config), sources };
}
