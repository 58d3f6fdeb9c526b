/**
 * Vector Index
 *
 * In-memory exact nearest-neighbour index over chunk vectors, scoped to one
 * embedding model identity.
 *
 * Similarity metric: cosine similarity, computed as the inner product of
 * L2-normalized vectors. Normalized copies are derived from the stored raw
 * vectors the same way at insert, load and query time, so a reloaded index
 * scores identically. Zero vectors score 0 against everything.
 *
 * Single writer: callers serialize mutations (the engine holds a mutex around
 * insert/remove/persist). search() is synchronous and therefore never sees a
 * half-applied mutation.
 */

import { DimensionMismatchError, InvalidConfigurationError } from "../errors.js";
import type { Document, SearchHit, VectorIndexEntry } from "./types.js";

interface StoredEntry {
	entry: VectorIndexEntry;
	/** Unit-length copy of entry.vector, null for the zero vector */
	unit: Float64Array | null;
}

/**
 * Unit-length copy of a vector, or null when its norm is zero
 */
export function normalize(vector: readonly number[]): Float64Array | null {
	let sumSquares = 0;
	for (const value of vector) {
		sumSquares += value * value;
	}
	const norm = Math.sqrt(sumSquares);
	if (norm === 0 || !Number.isFinite(norm)) {
		return null;
	}
	const unit = new Float64Array(vector.length);
	for (let i = 0; i < vector.length; i++) {
		unit[i] = vector[i] / norm;
	}
	return unit;
}

function dot(a: Float64Array, b: Float64Array): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		sum += a[i] * b[i];
	}
	return sum;
}

/**
 * Cosine similarity of two raw vectors, clamped to [-1, 1]
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	const ua = normalize(a);
	const ub = normalize(b);
	if (!ua || !ub) return 0;
	return Math.max(-1, Math.min(1, dot(ua, ub)));
}

export class VectorIndex {
	private stored: StoredEntry[] = [];
	private readonly documents = new Map<string, Document>();
	private dims: number | null;

	/**
	 * @param embeddingModelId - Identity every stored vector was produced by
	 * @param dimensions - Vector length; fixed by the first insert when omitted
	 */
	constructor(
		readonly embeddingModelId: string,
		dimensions: number | null = null,
	) {
		this.dims = dimensions;
	}

	get dimensions(): number | null {
		return this.dims;
	}

	/** Number of stored entries */
	get size(): number {
		return this.stored.length;
	}

	get documentCount(): number {
		return this.documents.size;
	}

	/**
	 * Append entries. All vectors are checked before any is stored.
	 *
	 * @throws DimensionMismatchError if any vector has the wrong length
	 */
	insert(entries: readonly VectorIndexEntry[]): void {
		if (entries.length === 0) return;
		const expected = this.dims ?? entries[0].vector.length;
		for (const entry of entries) {
			this.assertDimensions(entry.vector, expected);
		}
		this.dims = expected;
		for (const entry of entries) {
			this.stored.push({ entry, unit: normalize(entry.vector) });
		}
	}

	/**
	 * Register a document together with its entries
	 *
	 * @throws DimensionMismatchError if any vector has the wrong length
	 */
	addDocument(document: Document, entries: readonly VectorIndexEntry[]): void {
		this.insert(entries);
		this.registerDocument(document);
	}

	/**
	 * Record document metadata without touching entries (used when restoring)
	 */
	registerDocument(document: Document): void {
		this.documents.set(document.fingerprint, document);
	}

	/**
	 * The `k` most similar entries, best first. Equal scores keep insertion order.
	 *
	 * @throws InvalidConfigurationError if k is not a positive integer
	 * @throws DimensionMismatchError if the query has the wrong length
	 */
	search(queryVector: readonly number[], k: number): SearchHit[] {
		if (!Number.isInteger(k) || k < 1) {
			throw new InvalidConfigurationError(`k must be a positive integer, got ${k}`, "k");
		}
		if (this.stored.length === 0) {
			return [];
		}
		if (this.dims !== null) {
			this.assertDimensions(queryVector, this.dims);
		}

		const query = normalize(queryVector);
		const scored = this.stored.map(({ entry, unit }) => ({
			entry,
			score: query && unit ? Math.max(-1, Math.min(1, dot(query, unit))) : 0,
		}));
		// Array.prototype.sort is stable
		scored.sort((a, b) => b.score - a.score);
		return scored.slice(0, Math.min(k, scored.length));
	}

	/**
	 * Remove a document and all of its entries
	 *
	 * @returns Number of entries removed
	 */
	removeDocument(fingerprint: string): number {
		const before = this.stored.length;
		this.stored = this.stored.filter((s) => s.entry.documentFingerprint !== fingerprint);
		this.documents.delete(fingerprint);
		return before - this.stored.length;
	}

	getDocument(fingerprint: string): Document | undefined {
		return this.documents.get(fingerprint);
	}

	findDocumentBySource(sourceName: string): Document | undefined {
		for (const doc of this.documents.values()) {
			if (doc.sourceName === sourceName) return doc;
		}
		return undefined;
	}

	/** Documents in insertion order */
	listDocuments(): Document[] {
		return [...this.documents.values()];
	}

	/** Stored entries in insertion order */
	entries(): VectorIndexEntry[] {
		return this.stored.map((s) => s.entry);
	}

	countEntries(fingerprint: string): number {
		let count = 0;
		for (const s of this.stored) {
			if (s.entry.documentFingerprint === fingerprint) count++;
		}
		return count;
	}

	/**
	 * Independent copy; changes to either index leave the other untouched
	 */
	clone(): VectorIndex {
		const copy = new VectorIndex(this.embeddingModelId, this.dims);
		copy.stored = [...this.stored];
		for (const [fingerprint, document] of this.documents) {
			copy.documents.set(fingerprint, document);
		}
		return copy;
	}

	/** Drop every entry and document; the declared dimension is kept */
	clear(): void {
		this.stored = [];
		this.documents.clear();
	}

	private assertDimensions(vector: readonly number[], expected: number): void {
		if (vector.length !== expected) {
			throw new DimensionMismatchError(
				`Vector has ${vector.length} dimensions, index ${this.embeddingModelId} expects ${expected}`,
				expected,
				vector.length,
			);
		}
	}
}
