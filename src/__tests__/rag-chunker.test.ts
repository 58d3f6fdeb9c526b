/**
 * Tests for the boundary-aware chunker
 *
 * - Window and overlap arithmetic on a multi-paragraph document
 * - Separator preference and hard cuts
 * - Configuration validation
 * - Determinism and the slice invariant
 */

import { describe, expect, it } from "vitest";

import { BoundaryChunker, chunkText, generateChunkId, validateChunkingConfig } from "../rag/chunker.js";
import { InvalidConfigurationError } from "../errors.js";

const FINGERPRINT = "0123456789abcdef0123456789abcdef";

const PARAGRAPHS = [
	"The river delta supports a dense network of farms. Rice and vegetables grow on the fertile silt left by seasonal floods. Farmers rotate crops to keep the soil healthy.",
	"A railway line crosses the delta from north to south. It carries grain to the port city, where ships load cargo for export. Trains run every hour during harvest.",
	"The port city hosts a museum about the history of the river. Visitors can see old boats, maps and tools. The museum is open every day except Monday.",
];
const DOCUMENT = PARAGRAPHS.join("\n\n");

describe("rag/chunker.ts", () => {
	describe("BoundaryChunker", () => {
		it("should split a three paragraph document into overlapping windows", () => {
			const chunks = new BoundaryChunker().chunk(DOCUMENT, FINGERPRINT, { maxSize: 200, overlap: 50 });

			expect(chunks.map((c) => [c.start, c.end])).toEqual([
				[0, 169],
				[119, 293],
				[243, 437],
				[387, 480],
			]);
			for (const chunk of chunks) {
				expect(chunk.text.length).toBeLessThanOrEqual(200);
				expect(chunk.text).toBe(DOCUMENT.slice(chunk.start, chunk.end));
			}
			for (let i = 1; i < chunks.length; i++) {
				expect(chunks[i - 1].end - chunks[i].start).toBe(50);
			}
		});

		it("should prefer a paragraph break inside the lookback window", () => {
			const chunks = chunkText(DOCUMENT, FINGERPRINT, { maxSize: 200, overlap: 50 });
			expect(chunks[0].text.endsWith("healthy.\n\n")).toBe(true);
		});

		it("should cut after a sentence end when no line break is near", () => {
			const text = "Alpha beta gamma. Delta epsilon zeta eta theta";
			const chunks = chunkText(text, FINGERPRINT, { maxSize: 30, overlap: 5 });

			expect(chunks[0]).toMatchObject({ start: 0, end: 18, text: "Alpha beta gamma. " });
			expect(chunks[1].start).toBe(13);
		});

		it("should cut after a full-width sentence end", () => {
			const text = "第一句话很短。第二句话也不长但是要再长一点才会被切开";
			const chunks = chunkText(text, FINGERPRINT, { maxSize: 12, overlap: 2 });

			expect(chunks[0].text).toBe("第一句话很短。");
			expect(chunks[1].start).toBe(5);
		});

		it("should cut hard at maxSize when there is no separator", () => {
			const text = "x".repeat(25);
			const chunks = chunkText(text, FINGERPRINT, { maxSize: 10, overlap: 3 });

			expect(chunks.map((c) => [c.start, c.end])).toEqual([
				[0, 10],
				[7, 17],
				[14, 24],
				[21, 25],
			]);
		});

		it("should return one chunk for text shorter than maxSize", () => {
			const chunks = chunkText("Short note.", FINGERPRINT, { maxSize: 100, overlap: 10 });

			expect(chunks).toHaveLength(1);
			expect(chunks[0]).toEqual({
				id: `${FINGERPRINT.slice(0, 16)}-chunk-0000`,
				documentFingerprint: FINGERPRINT,
				index: 0,
				text: "Short note.",
				start: 0,
				end: 11,
			});
		});

		it("should return no chunks for empty or whitespace-only text", () => {
			const chunker = new BoundaryChunker();
			expect(chunker.chunk("", FINGERPRINT, { maxSize: 100, overlap: 10 })).toEqual([]);
			expect(chunker.chunk("  \n\n \t", FINGERPRINT, { maxSize: 100, overlap: 10 })).toEqual([]);
		});

		it("should produce identical chunks for identical input", () => {
			const first = chunkText(DOCUMENT, FINGERPRINT, { maxSize: 120, overlap: 20 });
			const second = chunkText(DOCUMENT, FINGERPRINT, { maxSize: 120, overlap: 20 });
			expect(second).toEqual(first);
		});

		it("should number chunks consecutively", () => {
			const chunks = chunkText(DOCUMENT, FINGERPRINT, { maxSize: 80, overlap: 10 });
			expect(chunks.map((c) => c.index)).toEqual(chunks.map((_, i) => i));
			expect(new Set(chunks.map((c) => c.id)).size).toBe(chunks.length);
		});

		it("should use custom separators when given", () => {
			const chunker = new BoundaryChunker(["|"]);
			const chunks = chunker.chunk("aaaa|bbbb|cccc", FINGERPRINT, { maxSize: 8, overlap: 1 });
			expect(chunks[0].text).toBe("aaaa|");
		});
	});

	describe("validateChunkingConfig", () => {
		it("should reject overlap equal to or larger than maxSize", () => {
			expect(() => validateChunkingConfig(50, 50)).toThrow(InvalidConfigurationError);
			expect(() => validateChunkingConfig(50, 80)).toThrow("overlap (80) must be smaller than maxSize (50)");
		});

		it("should reject non-positive or fractional values", () => {
			expect(() => validateChunkingConfig(0, 1)).toThrow("maxSize must be a positive integer, got 0");
			expect(() => validateChunkingConfig(100, 0)).toThrow("overlap must be a positive integer, got 0");
			expect(() => validateChunkingConfig(10.5, 2)).toThrow(InvalidConfigurationError);
		});

		it("should validate before looking at the text", () => {
			expect(() => chunkText("", FINGERPRINT, { maxSize: 10, overlap: 10 })).toThrow(InvalidConfigurationError);
		});
	});

	describe("generateChunkId", () => {
		it("should combine the fingerprint prefix with a padded index", () => {
			expect(generateChunkId(FINGERPRINT, 7)).toBe("0123456789abcdef-chunk-0007");
			expect(generateChunkId(FINGERPRINT, 12345)).toBe("0123456789abcdef-chunk-12345");
		});
	});
});
