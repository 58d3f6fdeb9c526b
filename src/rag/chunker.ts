/**
 * Chunker Module
 *
 * Splits document text into overlapping character windows suitable for
 * embedding and retrieval. Provides a Chunker interface so other split
 * strategies can be plugged into the engine.
 *
 * Chunking is pure: the same text and configuration always yield the same
 * chunks, which is what makes the ingestion cache sound.
 */

import type { ChunkingConfig } from "../config.js";
import { InvalidConfigurationError } from "../errors.js";
import type { Chunk } from "./types.js";

/**
 * Chunker interface for splitting content into chunks
 */
export interface Chunker {
	chunk(text: string, documentFingerprint: string, config: ChunkingConfig): Chunk[];
}

/**
 * Boundaries the splitter prefers, strongest first.
 * Chinese full-width sentence ends come before Latin ones.
 */
export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", "。", "！", "？", ". ", "! ", "? ", " "];

/**
 * Generate a stable chunk ID
 */
export function generateChunkId(documentFingerprint: string, index: number): string {
	return `${documentFingerprint.slice(0, 16)}-chunk-${index.toString().padStart(4, "0")}`;
}

/**
 * Reject non-integer, non-positive or inverted size/overlap pairs
 *
 * @throws InvalidConfigurationError
 */
export function validateChunkingConfig(maxSize: number, overlap: number): void {
	if (!Number.isInteger(maxSize) || maxSize <= 0) {
		throw new InvalidConfigurationError(`maxSize must be a positive integer, got ${maxSize}`, "maxSize");
	}
	if (!Number.isInteger(overlap) || overlap <= 0) {
		throw new InvalidConfigurationError(`overlap must be a positive integer, got ${overlap}`, "overlap");
	}
	if (overlap >= maxSize) {
		throw new InvalidConfigurationError(`overlap (${overlap}) must be smaller than maxSize (${maxSize})`, "overlap");
	}
}

/**
 * Boundary-aware sliding window chunker
 *
 * Strategy:
 * 1. Take a window of at most maxSize characters
 * 2. Inside the lookback window (the last maxSize/2 characters, but never
 *    within overlap+1 characters of the window start) cut after the
 *    strongest separator found
 * 3. Without a separator, cut hard at maxSize
 * 4. Start the next window `overlap` characters before the cut
 */
export class BoundaryChunker implements Chunker {
	constructor(private readonly separators: readonly string[] = DEFAULT_SEPARATORS) {}

	chunk(text: string, documentFingerprint: string, config: ChunkingConfig): Chunk[] {
		const { maxSize, overlap } = config;
		validateChunkingConfig(maxSize, overlap);

		if (!text.trim()) {
			return [];
		}

		const chunks: Chunk[] = [];
		let start = 0;

		while (start < text.length) {
			const end = this.findEnd(text, start, maxSize, overlap);
			chunks.push({
				id: generateChunkId(documentFingerprint, chunks.length),
				documentFingerprint,
				index: chunks.length,
				text: text.slice(start, end),
				start,
				end,
			});
			if (end >= text.length) {
				break;
			}
			start = end - overlap;
		}

		return chunks;
	}

	/**
	 * Cut position for the window starting at `start`
	 */
	private findEnd(text: string, start: number, maxSize: number, overlap: number): number {
		const hardEnd = Math.min(start + maxSize, text.length);
		if (hardEnd >= text.length) {
			return text.length;
		}

		// Keeps every window advancing by at least one character
		const lowerBound = Math.max(start + overlap + 1, hardEnd - Math.floor(maxSize / 2));

		for (const separator of this.separators) {
			const idx = text.lastIndexOf(separator, hardEnd - separator.length);
			if (idx < 0) continue;
			const cut = idx + separator.length;
			if (cut >= lowerBound && cut <= hardEnd) {
				return cut;
			}
		}

		return hardEnd;
	}
}

/**
 * Chunk text with the default chunker
 */
export function chunkText(text: string, documentFingerprint: string, config: ChunkingConfig): Chunk[] {
	return new BoundaryChunker().chunk(text, documentFingerprint, config);
}
