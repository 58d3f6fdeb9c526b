/**
 * Prompt Builder
 *
 * Assembles the synthesis prompt from retrieved chunks, tool results and the
 * question, and splits `<think>` reasoning off a model's answer.
 */

import type { RetrievedChunk } from "../rag/types.js";
import type { ToolInvocationRecord } from "../tools/types.js";

// =============================================================================
// Constants
// =============================================================================

/** Placed in the prompt when retrieval ran and found nothing relevant */
export const NO_CONTEXT_MARKER = "[NO RELEVANT CONTEXT] The indexed documents contain nothing relevant to this question.";

export const RAG_SYSTEM_PROMPT = `You are a helpful assistant answering questions about the user's documents.
Rules:
- When retrieved context is provided, answer strictly from it and cite sources as [n].
- When the prompt says there is no relevant context, say so plainly instead of guessing.
- When tool results are provided, use them for live data such as weather.
- If a tool failed, tell the user what could not be looked up.
- Think inside <think></think> tags before answering. Keep the answer concise and accurate.`;

export const CHAT_SYSTEM_PROMPT = `You are a helpful assistant. Answer from your own knowledge unless tool results are provided.
- When tool results are provided, use them for live data such as weather.
- If a tool failed, tell the user what could not be looked up.
- Think inside <think></think> tags before answering. Keep the answer concise and accurate.`;

// =============================================================================
// Synthesis prompt
// =============================================================================

export interface SynthesisInput {
	question: string;
	/** Null when retrieval did not run for this turn */
	retrieved: RetrievedChunk[] | null;
	toolInvocations: ToolInvocationRecord[];
	notes: string[];
}

function formatChunk(item: RetrievedChunk, position: number): string {
	return `[${position}] ${item.sourceName} (relevance ${item.score.toFixed(2)})\n${item.chunk.text.trim()}`;
}

function formatInvocation(record: ToolInvocationRecord): string {
	const call = `${record.toolName}(${JSON.stringify(record.arguments)})`;
	if (record.outcome.ok) {
		return `${call} returned:\n${JSON.stringify(record.outcome.result, null, 2)}`;
	}
	return `${call} failed (${record.outcome.error.code}): ${record.outcome.error.message}`;
}

export function buildSynthesisPrompt(input: SynthesisInput): string {
	const sections: string[] = [];

	if (input.retrieved !== null) {
		const body =
			input.retrieved.length > 0 ? input.retrieved.map((item, i) => formatChunk(item, i + 1)).join("\n\n") : NO_CONTEXT_MARKER;
		sections.push(`## Retrieved context\n${body}`);
	}

	if (input.toolInvocations.length > 0) {
		sections.push(`## Tool results\n${input.toolInvocations.map(formatInvocation).join("\n\n")}`);
	}

	if (input.notes.length > 0) {
		sections.push(`## Notes\n${input.notes.map((note) => `- ${note}`).join("\n")}`);
	}

	sections.push(`## Question\n${input.question}`);
	return sections.join("\n\n");
}

// =============================================================================
// Reasoning extraction
// =============================================================================

const THINK_BLOCK = /<think>([\s\S]*?)<\/think>/g;

export interface SplitAnswer {
	answer: string;
	reasoning?: string;
}

/**
 * Separate `<think>…</think>` blocks from the visible answer
 */
export function splitReasoning(raw: string): SplitAnswer {
	const thoughts = [...raw.matchAll(THINK_BLOCK)].map((m) => m[1].trim()).filter(Boolean);
	const answer = raw.replace(THINK_BLOCK, "").trim();
	return thoughts.length > 0 ? { answer, reasoning: thoughts.join("\n\n") } : { answer };
}

const OPEN_TAG = "<think>";
const CLOSE_TAG = "</think>";

/**
 * Drops `<think>` spans from a stream of answer fragments as they arrive.
 * A tag split across fragments is held back until it can be recognised.
 */
export class ReasoningFilter {
	private pending = "";
	private inside = false;
	private started = false;

	/** Visible part of the text received so far that was not yet returned */
	push(fragment: string): string {
		this.pending += fragment;
		let visible = "";
		for (;;) {
			const tag = this.inside ? CLOSE_TAG : OPEN_TAG;
			const at = this.pending.indexOf(tag);
			if (at === -1) break;
			if (!this.inside) visible += this.pending.slice(0, at);
			this.pending = this.pending.slice(at + tag.length);
			this.inside = !this.inside;
		}

		const held = partialTagLength(this.pending, this.inside ? CLOSE_TAG : OPEN_TAG);
		if (!this.inside) visible += this.pending.slice(0, this.pending.length - held);
		this.pending = this.pending.slice(this.pending.length - held);
		return this.emit(visible);
	}

	/** Text still held back when the stream ends */
	flush(): string {
		const rest = this.inside ? "" : this.pending;
		this.pending = "";
		return this.emit(rest);
	}

	private emit(visible: string): string {
		// Leading whitespace after a think block is not part of the answer
		const text = this.started ? visible : visible.trimStart();
		if (text) this.started = true;
		return text;
	}
}

/** Length of the longest suffix of `text` that begins `tag` */
function partialTagLength(text: string, tag: string): number {
	for (let n = Math.min(tag.length - 1, text.length); n > 0; n--) {
		if (tag.startsWith(text.slice(-n))) return n;
	}
	return 0;
}
