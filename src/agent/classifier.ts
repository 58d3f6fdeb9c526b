/**
 * Intent Classification
 *
 * Decides which path a user message takes: retrieval over the indexed
 * documents, one or more tool calls, or both. The orchestrator only sees the
 * IntentClassifier interface, so a model-based strategy can replace the
 * rule-based default without touching it.
 */

import type { ToolCall } from "../tools/types.js";

export type Intent = "document" | "tool" | "ambiguous";

export interface Classification {
	intent: Intent;
	/** Calls to run on the tool path; empty for document questions */
	toolCalls: ToolCall[];
	/** Reasons worth surfacing in the synthesis prompt */
	notes: string[];
}

export interface IntentClassifier {
	classify(message: string): Promise<Classification>;
}

/**
 * How one tool recognizes its questions
 */
export interface ToolRule {
	toolName: string;
	matches(message: string): boolean;
	/** Arguments for the call, or null when the message lacks them */
	extractArguments(message: string): Record<string, unknown> | null;
}

/** Phrases that point at the uploaded documents */
const DOCUMENT_CUE =
	/\b(?:documents?|reports?|files?|pdfs?|uploaded|papers?|articles?|according to|the text)\b|文档|文件|报告|资料|上传|根据/i;

/**
 * Keyword rules, no model call
 *
 * - a tool cue with extractable arguments yields a call to that tool
 * - a tool call plus a document cue is ambiguous: both paths run
 * - a cue without arguments falls back to the documents, with a note
 * - no cue at all is a document question
 */
export class RuleBasedIntentClassifier implements IntentClassifier {
	constructor(private readonly rules: ToolRule[]) {}

	async classify(message: string): Promise<Classification> {
		const toolCalls: ToolCall[] = [];
		const notes: string[] = [];

		for (const rule of this.rules) {
			if (!rule.matches(message)) continue;
			const args = rule.extractArguments(message);
			if (args) {
				toolCalls.push({ toolName: rule.toolName, arguments: args });
			} else {
				notes.push(`The question looks like a ${rule.toolName} request, but its arguments could not be determined.`);
			}
		}

		if (toolCalls.length === 0) {
			return { intent: "document", toolCalls, notes };
		}
		return { intent: DOCUMENT_CUE.test(message) ? "ambiguous" : "tool", toolCalls, notes };
	}
}
