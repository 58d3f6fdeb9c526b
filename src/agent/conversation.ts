/**
 * Conversation State
 *
 * Append-only list of turns for the session, mirrored to a JSONL log
 * (`<stateDir>/history.jsonl`, one turn per line) so history survives
 * restarts. The log is only ever appended to, exported whole or truncated.
 */

import { randomBytes } from "node:crypto";
import * as fs from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { storeLogger } from "../logger.js";
import type { ChatMessage } from "../llm/types.js";

const logger = storeLogger.child({ component: "conversation" });

// =============================================================================
// Schema
// =============================================================================

const ToolInvocationRecordSchema = z.object({
	toolName: z.string(),
	arguments: z.unknown(),
	outcome: z.discriminatedUnion("ok", [
		z.object({ ok: z.literal(true), result: z.unknown() }),
		z.object({ ok: z.literal(false), error: z.object({ code: z.string(), message: z.string() }) }),
	]),
	timestamp: z.string(),
	durationMs: z.number(),
});

const SourceReferenceSchema = z.object({
	sourceName: z.string(),
	chunkId: z.string(),
	score: z.number(),
});

export const ConversationTurnSchema = z.object({
	id: z.string().min(1),
	role: z.enum(["user", "assistant"]),
	text: z.string(),
	timestamp: z.string(),
	status: z.enum(["ok", "failed"]),
	modelId: z.string().optional(),
	reasoning: z.string().optional(),
	toolInvocations: z.array(ToolInvocationRecordSchema).optional(),
	sources: z.array(SourceReferenceSchema).optional(),
	error: z.object({ code: z.string(), message: z.string() }).optional(),
});

export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;
export type SourceReference = z.infer<typeof SourceReferenceSchema>;
export type NewTurn = Omit<ConversationTurn, "id" | "timestamp">;

/**
 * Generate a unique turn ID
 */
function generateTurnId(): string {
	return `turn-${Date.now().toString(36)}-${randomBytes(3).toString("hex")}`;
}

// =============================================================================
// State
// =============================================================================

export class ConversationState {
	private readonly turns: ConversationTurn[];

	/**
	 * @param logPath - JSONL file to mirror turns into; null keeps them in memory
	 */
	constructor(
		private readonly logPath: string | null,
		turns: ConversationTurn[] = [],
	) {
		this.turns = [...turns];
	}

	/**
	 * Restore a conversation from its log
	 *
	 * Lines that are not valid turns are skipped with a warning.
	 */
	static load(logPath: string): ConversationState {
		if (!fs.existsSync(logPath)) {
			return new ConversationState(logPath);
		}

		const turns: ConversationTurn[] = [];
		const lines = fs.readFileSync(logPath, "utf-8").split("\n");
		lines.forEach((line, i) => {
			if (!line.trim()) return;
			let raw: unknown;
			try {
				raw = JSON.parse(line);
			} catch {
				logger.warn({ logPath, line: i + 1 }, "Skipping unparseable history line");
				return;
			}
			const parsed = ConversationTurnSchema.safeParse(raw);
			if (parsed.success) {
				turns.push(parsed.data);
			} else {
				logger.warn({ logPath, line: i + 1, issues: parsed.error.issues.length }, "Skipping invalid history line");
			}
		});

		logger.debug({ logPath, turns: turns.length }, "Conversation restored");
		return new ConversationState(logPath, turns);
	}

	get size(): number {
		return this.turns.length;
	}

	/**
	 * Append a turn, assigning its id and timestamp
	 */
	append(turn: NewTurn): ConversationTurn {
		const stored: ConversationTurn = { id: generateTurnId(), timestamp: new Date().toISOString(), ...turn };
		this.turns.push(stored);
		if (this.logPath) {
			fs.mkdirSync(dirname(this.logPath), { recursive: true });
			fs.appendFileSync(this.logPath, `${JSON.stringify(stored)}\n`);
		}
		return stored;
	}

	all(): ConversationTurn[] {
		return [...this.turns];
	}

	/**
	 * The last `count` successful turns, oldest first
	 *
	 * Failed assistant turns are left out so an error message is never fed
	 * back to the model as if it had said it.
	 */
	recent(count: number): ConversationTurn[] {
		if (count <= 0) return [];
		return this.turns.filter((turn) => turn.status === "ok").slice(-count);
	}

	/**
	 * Bounded chat history for the next generation call
	 *
	 * @param count - Window size
	 * @param excludeId - Turn to leave out (the question being answered)
	 */
	historyWindow(count: number, excludeId?: string): ChatMessage[] {
		const eligible = this.turns.filter((turn) => turn.status === "ok" && turn.id !== excludeId);
		if (count <= 0) return [];
		return eligible.slice(-count).map((turn) => ({ role: turn.role, text: turn.text }));
	}

	/**
	 * Whole conversation as pretty-printed JSON
	 */
	export(): string {
		return JSON.stringify({ exportedAt: new Date().toISOString(), turns: this.turns }, null, 2);
	}

	/**
	 * Forget every turn and truncate the log
	 *
	 * @returns Number of turns removed
	 */
	clear(): number {
		const removed = this.turns.length;
		this.turns.length = 0;
		if (this.logPath && fs.existsSync(this.logPath)) {
			fs.writeFileSync(this.logPath, "");
		}
		logger.info({ removed }, "Conversation cleared");
		return removed;
	}
}
