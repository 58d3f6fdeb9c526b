/**
 * Unified Output System
 *
 * Everything the CLI prints goes through here, in one of two modes:
 * - human: colored lines for a terminal; answers stream token by token
 * - agent: one JSON event per line, for scripts and other programs (default when piped)
 *
 * The mode follows the TTY unless RAG_AGENT_OUTPUT or --human says otherwise.
 */

import chalk from "chalk";

export type OutputMode = "human" | "agent";

export type OutputEventType =
	| "info"
	| "success"
	| "error"
	| "warning"
	| "progress"
	| "status"
	| "debug"
	| "answer"
	| "token";

/**
 * Structured event for agent-mode JSON output
 */
export interface OutputEvent {
	type: OutputEventType;
	message: string;
	timestamp: string;
	data?: Record<string, unknown>;
}

interface OutputSettings {
	mode: OutputMode;
	verbose: boolean;
}

const settings: OutputSettings = {
	mode: detectMode(),
	verbose: false,
};

function detectMode(): OutputMode {
	const forced = process.env.RAG_AGENT_OUTPUT;
	if (forced === "human" || forced === "agent") return forced;
	if (process.argv.includes("--human")) return "human";
	return process.stdout.isTTY ? "human" : "agent";
}

export function configureOutput(config: Partial<OutputSettings>): void {
	if (config.mode !== undefined) settings.mode = config.mode;
	if (config.verbose !== undefined) settings.verbose = config.verbose;
}

export function getOutputMode(): OutputMode {
	return settings.mode;
}

export function isHumanMode(): boolean {
	return settings.mode === "human";
}

// =============================================================================
// Event emission
// =============================================================================

const HUMAN_PREFIX: Record<OutputEventType, (mark: string) => string> = {
	info: chalk.dim,
	success: chalk.green,
	error: chalk.red,
	warning: chalk.yellow,
	progress: chalk.cyan,
	status: chalk.dim,
	debug: chalk.dim,
	answer: chalk.green,
	token: (mark) => mark,
};

const HUMAN_MARK: Record<OutputEventType, string> = {
	info: "•",
	success: "✓",
	error: "✗",
	warning: "⚠",
	progress: "→",
	status: "•",
	debug: "·",
	answer: "»",
	token: "",
};

function emit(type: OutputEventType, message: string, data?: Record<string, unknown>): void {
	if (settings.mode === "agent") {
		const event: OutputEvent = { type, message, timestamp: new Date().toISOString(), data };
		console.log(JSON.stringify(event));
		return;
	}
	const line = `${HUMAN_PREFIX[type](HUMAN_MARK[type])} ${message}`;
	if (data && settings.verbose) {
		console.log(line, data);
	} else {
		console.log(line);
	}
}

export function info(message: string, data?: Record<string, unknown>): void {
	emit("info", message, data);
}

export function success(message: string, data?: Record<string, unknown>): void {
	emit("success", message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
	emit("error", message, data);
}

export function warning(message: string, data?: Record<string, unknown>): void {
	emit("warning", message, data);
}

export function status(message: string, data?: Record<string, unknown>): void {
	emit("status", message, data);
}

/**
 * Only printed in verbose mode
 */
export function debug(message: string, data?: Record<string, unknown>): void {
	if (settings.verbose) {
		emit("debug", message, data);
	}
}

// =============================================================================
// Answers
// =============================================================================

export interface AnswerSource {
	sourceName: string;
	score: number;
}

export interface AnswerDetails {
	/** The text was already written through token() */
	streamed?: boolean;
	/** Model reasoning, shown in verbose human mode */
	reasoning?: string;
	sources?: AnswerSource[];
	data?: Record<string, unknown>;
}

/**
 * Output a finished assistant answer with the documents it drew on
 */
export function answer(text: string, details: AnswerDetails = {}): void {
	const sources = details.sources ?? [];
	if (settings.mode === "agent") {
		emit("answer", text, {
			...details.data,
			sources,
			...(details.reasoning ? { reasoning: details.reasoning } : {}),
		});
		return;
	}

	if (details.reasoning && settings.verbose) {
		console.log(chalk.dim(details.reasoning));
	}
	if (details.streamed) {
		process.stdout.write("\n");
	} else {
		console.log(`${HUMAN_PREFIX.answer(HUMAN_MARK.answer)} ${text}`);
	}
	if (sources.length > 0) {
		console.log(chalk.dim(`  sources: ${sources.map((s) => `${s.sourceName} (${s.score.toFixed(2)})`).join(", ")}`));
	}
}

/**
 * Output one streamed answer fragment
 */
export function token(fragment: string): void {
	if (settings.mode === "agent") {
		emit("token", fragment);
	} else {
		process.stdout.write(fragment);
	}
}

// =============================================================================
// Listings
// =============================================================================

export function header(title: string, subtitle?: string): void {
	if (settings.mode === "agent") {
		emit("info", title, subtitle ? { subtitle } : undefined);
		return;
	}
	console.log();
	console.log(chalk.cyan.bold(title));
	if (subtitle) {
		console.log(chalk.dim(`  ${subtitle}`));
	}
	console.log();
}

export function section(title: string): void {
	if (settings.mode === "agent") {
		emit("status", title);
		return;
	}
	console.log(chalk.cyan(`\n── ${title} ──`));
}

export function keyValue(key: string, value: string | number | boolean): void {
	if (settings.mode === "agent") {
		emit("info", `${key}: ${value}`, { [key]: value });
		return;
	}
	console.log(`  ${chalk.dim(`${key}:`)} ${value}`);
}

export function list(items: string[], bullet: string = "•"): void {
	if (settings.mode === "agent") {
		emit("info", "list", { items });
		return;
	}
	for (const item of items) {
		console.log(`  ${chalk.dim(bullet)} ${item}`);
	}
}

// =============================================================================
// Ingestion progress
// =============================================================================

export type IngestStatus = "indexed" | "cached" | "unchanged" | "failed";

/**
 * Per-file progress for a batch ingest, with a closing tally by status
 */
export class IngestProgress {
	private done = 0;
	private readonly startedAt = Date.now();
	private readonly counts: Record<IngestStatus, number> = { indexed: 0, cached: 0, unchanged: 0, failed: 0 };

	constructor(private readonly total: number) {}

	record(sourceName: string, outcome: IngestStatus, detail?: string, data?: Record<string, unknown>): void {
		this.done++;
		this.counts[outcome]++;
		const message = `[${this.done}/${this.total}] ${sourceName}: ${detail ?? outcome}`;
		const eventData = { ...data, sourceName, status: outcome, current: this.done, total: this.total };
		emit(outcome === "failed" ? "warning" : "progress", message, eventData);
	}

	/**
	 * Print the tally and return it
	 */
	finish(): Record<IngestStatus, number> {
		const ingested = this.total - this.counts.failed;
		const durationMs = Date.now() - this.startedAt;
		const message = `Ingested ${ingested}/${this.total} document(s)`;
		const data = { ...this.counts, durationMs };
		if (this.counts.failed > 0) {
			emit("warning", message, data);
		} else {
			emit("success", message, data);
		}
		return { ...this.counts };
	}
}
