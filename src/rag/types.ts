/**
 * RAG Module Types
 *
 * Core type definitions for the ingestion and retrieval pipeline:
 * documents, chunks, index entries and the cache record that ties a
 * document to its embedded chunks.
 */

import type { ChunkingConfig } from "../config.js";

export type { ChunkingConfig };

/**
 * Declared document type
 */
export type DocumentType = "pdf" | "text";

/**
 * A document stored in the index
 *
 * Identified by the sha256 of its raw bytes. Re-uploading a source name with
 * different bytes supersedes the old document rather than changing it.
 */
export interface Document {
	fingerprint: string;
	sourceName: string;
	type: DocumentType;
	/** Extracted text the chunks were cut from */
	text: string;
	/** Chunking configuration the stored chunks were produced with */
	chunking: ChunkingConfig;
	indexedAt: string;
}

/**
 * A contiguous span of a document's text
 *
 * Invariant: `text === document.text.slice(start, end)`.
 */
export interface Chunk {
	id: string;
	documentFingerprint: string;
	/** Position of the chunk within its document, from 0 */
	index: number;
	text: string;
	start: number;
	end: number;
}

/**
 * Chunk plus its vector and owning document
 */
export interface VectorIndexEntry {
	chunk: Chunk;
	vector: number[];
	documentFingerprint: string;
	sourceName: string;
}

/**
 * Index search hit, best first
 */
export interface SearchHit {
	entry: VectorIndexEntry;
	/** Cosine similarity in [-1, 1] */
	score: number;
}

/**
 * Ingestion cache key components
 */
export interface CacheKey {
	fingerprint: string;
	chunking: ChunkingConfig;
	embeddingModelId: string;
}

/**
 * Cached result of chunking and embedding one document
 */
export interface CacheEntry {
	key: CacheKey;
	items: Array<{ chunk: Chunk; vector: number[] }>;
	createdAt: string;
}

/**
 * Retrieved chunk with its similarity score
 */
export interface RetrievedChunk {
	chunk: Chunk;
	score: number;
	sourceName: string;
}

/**
 * Input for ingesting one document
 */
export interface IngestOptions {
	bytes: Uint8Array;
	sourceName: string;
	/** Declared type; inferred from the source name extension when omitted */
	type?: DocumentType;
	/** Defaults to the configured chunking */
	chunking?: ChunkingConfig;
	/** Must match the index scope; defaults to it */
	embeddingModelId?: string;
	signal?: AbortSignal;
}

/**
 * Result from ingesting a document
 */
export interface IngestResult {
	fingerprint: string;
	sourceName: string;
	chunksIndexed: number;
	/** Chunks and vectors came from the ingestion cache */
	fromCache: boolean;
	/** Document was already indexed with the same configuration; nothing changed */
	alreadyIndexed: boolean;
	/** Fingerprint of the document this upload replaced */
	superseded?: string;
}

/**
 * Index statistics
 */
export interface IndexStats {
	embeddingModelId: string;
	dimensions: number | null;
	documentCount: number;
	entryCount: number;
	documents: Array<{ fingerprint: string; sourceName: string; type: DocumentType; chunkCount: number }>;
}
