/**
 * Conversation Commands
 *
 * | Command         | Purpose                                        |
 * |-----------------|------------------------------------------------|
 * | ask             | Answer one question and exit                   |
 * | chat            | Interactive session with streaming answers     |
 * | history export  | Write the conversation as JSON                 |
 * | history clear   | Forget the conversation                        |
 */

import { writeFile } from "node:fs/promises";
import * as readline from "node:readline";
import chalk from "chalk";
import type { Command } from "commander";
import type { TurnOutcome, TurnRequest } from "../agent/orchestrator.js";
import { errorMessage } from "../errors.js";
import { answer, debug, error, info, isHumanMode, list, status, success, token, warning } from "../output.js";
import type { Runtime } from "../runtime.js";
import { fail, getRuntime } from "./context.js";
import type { CommandModule } from "./types.js";

// =============================================================================
// Option Types
// =============================================================================

interface AskOptions {
	model?: string;
	rag?: boolean;
	stream?: boolean;
}

interface ExportOptions {
	output?: string;
}

// =============================================================================
// Chat slash commands
// =============================================================================

export type ChatCommand =
	| { kind: "model"; modelId: string | null }
	| { kind: "rag"; enabled: boolean | null }
	| { kind: "clear" }
	| { kind: "export"; path: string | null }
	| { kind: "help" }
	| { kind: "exit" }
	| { kind: "unknown"; name: string };

/**
 * Parse a `/command` line; null for an ordinary message
 */
export function parseChatCommand(line: string): ChatCommand | null {
	const trimmed = line.trim();
	if (!trimmed.startsWith("/")) {
		return null;
	}
	const [name, ...rest] = trimmed.slice(1).split(/\s+/);
	const arg = rest.join(" ").trim() || null;

	switch (name.toLowerCase()) {
		case "model":
			return { kind: "model", modelId: arg };
		case "rag":
			return { kind: "rag", enabled: arg === null ? null : arg.toLowerCase() === "on" };
		case "clear":
			return { kind: "clear" };
		case "export":
			return { kind: "export", path: arg };
		case "help":
			return { kind: "help" };
		case "exit":
		case "quit":
			return { kind: "exit" };
		default:
			return { kind: "unknown", name };
	}
}

export interface ChatSession {
	modelId: string;
	retrieval: boolean;
}

const CHAT_HELP = [
	"/model [id]     show or switch the generation model",
	"/rag [on|off]   show or toggle document retrieval",
	"/clear          forget the conversation",
	"/export [file]  write the conversation as JSON",
	"/exit           leave the session",
];

// =============================================================================
// Handlers
// =============================================================================

function reportOutcome(outcome: TurnOutcome, streamed: boolean): void {
	debug(`Turn ${outcome.trace.join(" → ")}`, {
		intent: outcome.classification?.intent ?? null,
		retrieved: outcome.retrieved?.length ?? null,
	});
	for (const record of outcome.toolInvocations) {
		if (record.outcome.ok) {
			status(`Tool ${record.toolName} answered in ${record.durationMs}ms`, { arguments: record.arguments });
		} else {
			warning(`Tool ${record.toolName} failed: ${record.outcome.error.message}`, { code: record.outcome.error.code });
		}
	}

	if (outcome.state === "FAILED") {
		if (streamed && isHumanMode()) {
			process.stdout.write("\n");
		}
		error(outcome.turn.text, { code: outcome.turn.error?.code, trace: outcome.trace });
		return;
	}

	answer(outcome.turn.text, {
		streamed,
		reasoning: outcome.turn.reasoning,
		sources: outcome.turn.sources,
		data: { modelId: outcome.turn.modelId, trace: outcome.trace },
	});
}

export async function runTurn(runtime: Runtime, request: TurnRequest, stream: boolean): Promise<TurnOutcome> {
	const outcome = await runtime.orchestrator.handleTurn({
		...request,
		...(stream ? { onToken: token } : {}),
	});
	reportOutcome(outcome, stream);
	return outcome;
}

async function handleAsk(words: string[], options: AskOptions, command: Command): Promise<void> {
	const runtime = getRuntime(command);
	const controller = new AbortController();
	const onSigint = (): void => controller.abort(new Error("interrupted"));
	process.once("SIGINT", onSigint);

	try {
		const outcome = await runTurn(
			runtime,
			{
				message: words.join(" "),
				modelId: options.model,
				retrieval: options.rag,
				signal: controller.signal,
			},
			options.stream ?? false,
		);
		if (outcome.state === "FAILED") {
			process.exitCode = 1;
		}
	} finally {
		process.removeListener("SIGINT", onSigint);
	}
}

/**
 * Carry out a slash command; false ends the session
 */
export async function applyCommand(runtime: Runtime, session: ChatSession, cmd: ChatCommand): Promise<boolean> {
	switch (cmd.kind) {
		case "model":
			if (cmd.modelId === null) {
				info(`Model: ${session.modelId}`);
				list(runtime.models.list().map((m) => m.id));
			} else if (!runtime.models.has(cmd.modelId)) {
				warning(`Unknown model ${cmd.modelId}`);
			} else {
				session.modelId = cmd.modelId;
				success(`Model switched to ${cmd.modelId}`);
			}
			return true;
		case "rag":
			if (cmd.enabled !== null) {
				session.retrieval = cmd.enabled;
			}
			info(`Document retrieval ${session.retrieval ? "on" : "off"}`);
			return true;
		case "clear":
			success(`Cleared ${runtime.conversation.clear()} turn(s)`);
			return true;
		case "export": {
			const target = cmd.path ?? `conversation-${Date.now()}.json`;
			try {
				await writeFile(target, runtime.conversation.export());
				success(`Conversation exported to ${target}`);
			} catch (err) {
				warning(`Could not export the conversation to ${target}: ${errorMessage(err)}`);
			}
			return true;
		}
		case "help":
			list(CHAT_HELP, "/");
			return true;
		case "exit":
			return false;
		case "unknown":
			warning(`Unknown command /${cmd.name}; try /help`);
			return true;
	}
}

async function handleChat(options: AskOptions, command: Command): Promise<void> {
	const runtime = getRuntime(command);
	const session: ChatSession = {
		modelId: options.model ?? runtime.models.defaultModelId,
		retrieval: options.rag ?? runtime.config.retrieval.enabled,
	};
	if (!runtime.models.has(session.modelId)) {
		fail("Chat failed", new Error(`unknown model ${session.modelId}`));
	}

	const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: chalk.cyan("you › ") });
	let current: AbortController | null = null;
	rl.on("SIGINT", () => {
		if (current) {
			current.abort(new Error("interrupted"));
		} else {
			rl.close();
		}
	});

	info(`Chatting with ${session.modelId}; retrieval ${session.retrieval ? "on" : "off"}. Type /help for commands.`);
	rl.prompt();

	for await (const line of rl) {
		const cmd = parseChatCommand(line);
		if (cmd) {
			if (!(await applyCommand(runtime, session, cmd))) {
				break;
			}
		} else if (line.trim()) {
			current = new AbortController();
			try {
				await runTurn(
					runtime,
					{ message: line.trim(), modelId: session.modelId, retrieval: session.retrieval, signal: current.signal },
					options.stream ?? true,
				);
			} finally {
				current = null;
			}
		}
		rl.prompt();
	}
	rl.close();
}

async function handleHistoryExport(options: ExportOptions, command: Command): Promise<void> {
	const { conversation } = getRuntime(command);
	const json = conversation.export();
	if (!options.output) {
		console.log(json);
		return;
	}
	try {
		await writeFile(options.output, json);
		success(`Exported ${conversation.size} turn(s) to ${options.output}`);
	} catch (err) {
		fail("Export failed", err);
	}
}

function handleHistoryClear(_options: unknown, command: Command): void {
	const { conversation } = getRuntime(command);
	success(`Cleared ${conversation.clear()} turn(s)`);
}

// =============================================================================
// Command Module
// =============================================================================

export const chatCommands: CommandModule = {
	register(program) {
		program
			.command("ask <question...>")
			.description("Answer one question from the indexed documents and tools")
			.option("-m, --model <id>", "Generation model id")
			.option("--rag", "Retrieve from the indexed documents")
			.option("--no-rag", "Answer without document retrieval")
			.option("-s, --stream", "Stream the answer as it is generated")
			.action(handleAsk);

		program
			.command("chat")
			.description("Interactive conversation")
			.option("-m, --model <id>", "Generation model id")
			.option("--rag", "Start with document retrieval on")
			.option("--no-rag", "Start with document retrieval off")
			.option("--no-stream", "Print answers only once complete")
			.action(handleChat);

		const history = program.command("history").description("Manage the conversation history");
		history
			.command("export")
			.description("Write the conversation as JSON")
			.option("-o, --output <file>", "File to write instead of stdout")
			.action(handleHistoryExport);
		history.command("clear").description("Forget the conversation").action(handleHistoryClear);
	},
};
