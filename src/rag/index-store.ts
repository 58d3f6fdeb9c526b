/**
 * Vector Index Persistence
 *
 * Stores a VectorIndex as one self-describing SQLite file (better-sqlite3):
 * - meta: format version, embedding model identity, dimensions, metric
 * - documents: fingerprint, source name, type, extracted text, chunking
 * - entries: chunks in insertion order with their raw vectors
 *
 * Vectors are written as little-endian float64 blobs, so a reload restores
 * every component bit for bit. The file is built under a temporary name and
 * renamed over the previous one, so readers only ever see a complete index.
 */

import { existsSync, mkdirSync, renameSync, rmSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { INDEX_FORMAT_VERSION } from "../constants.js";
import { InvalidConfigurationError } from "../errors.js";
import { withFileLockAsync } from "../file-lock.js";
import { indexLogger } from "../logger.js";
import type { Document, DocumentType, VectorIndexEntry } from "./types.js";
import { VectorIndex } from "./vector-index.js";

const logger = indexLogger.child({ component: "index-store" });

const METRIC = "cosine";

/**
 * Database row types for SQLite mapping
 */
interface MetaRow {
	key: string;
	value: string;
}

interface DocumentRow {
	fingerprint: string;
	source_name: string;
	type: string;
	text: string;
	max_size: number;
	overlap: number;
	indexed_at: string;
}

interface EntryRow {
	position: number;
	chunk_id: string;
	document_fingerprint: string;
	source_name: string;
	chunk_index: number;
	text: string;
	start_offset: number;
	end_offset: number;
	vector: Buffer;
}

function initializeSchema(db: Database.Database): void {
	db.exec(`
		CREATE TABLE meta (
			key TEXT PRIMARY KEY,
			value TEXT NOT NULL
		);

		CREATE TABLE documents (
			fingerprint TEXT PRIMARY KEY,
			source_name TEXT NOT NULL,
			type TEXT NOT NULL,
			text TEXT NOT NULL,
			max_size INTEGER NOT NULL,
			overlap INTEGER NOT NULL,
			indexed_at TEXT NOT NULL
		);

		CREATE TABLE entries (
			position INTEGER PRIMARY KEY,
			chunk_id TEXT NOT NULL,
			document_fingerprint TEXT NOT NULL,
			source_name TEXT NOT NULL,
			chunk_index INTEGER NOT NULL,
			text TEXT NOT NULL,
			start_offset INTEGER NOT NULL,
			end_offset INTEGER NOT NULL,
			vector BLOB NOT NULL
		);

		CREATE INDEX idx_entries_document ON entries(document_fingerprint);
	`);
}

// =============================================================================
// Vector encoding
// =============================================================================

export function encodeVector(vector: readonly number[]): Buffer {
	const buffer = Buffer.alloc(vector.length * 8);
	for (let i = 0; i < vector.length; i++) {
		buffer.writeDoubleLE(vector[i], i * 8);
	}
	return buffer;
}

export function decodeVector(blob: Uint8Array): number[] {
	const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
	const vector = new Array<number>(blob.byteLength / 8);
	for (let i = 0; i < vector.length; i++) {
		vector[i] = view.getFloat64(i * 8, true);
	}
	return vector;
}

function isDocumentType(value: string): value is DocumentType {
	return value === "pdf" || value === "text";
}

// =============================================================================
// Save / load
// =============================================================================

/**
 * Write the whole index into a fresh database at `filePath`
 */
function writeDatabase(index: VectorIndex, filePath: string): void {
	const db = new Database(filePath);
	try {
		initializeSchema(db);

		const insertMeta = db.prepare<[string, string]>("INSERT INTO meta (key, value) VALUES (?, ?)");
		const insertDocument = db.prepare<[string, string, string, string, number, number, string]>(`
			INSERT INTO documents (fingerprint, source_name, type, text, max_size, overlap, indexed_at)
			VALUES (?, ?, ?, ?, ?, ?, ?)
		`);
		const insertEntry = db.prepare<[number, string, string, string, number, string, number, number, Buffer]>(`
			INSERT INTO entries (position, chunk_id, document_fingerprint, source_name, chunk_index, text, start_offset, end_offset, vector)
			VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
		`);

		const writeAll = db.transaction(() => {
			insertMeta.run("format_version", String(INDEX_FORMAT_VERSION));
			insertMeta.run("embedding_model_id", index.embeddingModelId);
			insertMeta.run("dimensions", index.dimensions === null ? "" : String(index.dimensions));
			insertMeta.run("metric", METRIC);

			for (const doc of index.listDocuments()) {
				insertDocument.run(
					doc.fingerprint,
					doc.sourceName,
					doc.type,
					doc.text,
					doc.chunking.maxSize,
					doc.chunking.overlap,
					doc.indexedAt,
				);
			}

			index.entries().forEach((entry, position) => {
				insertEntry.run(
					position,
					entry.chunk.id,
					entry.documentFingerprint,
					entry.sourceName,
					entry.chunk.index,
					entry.chunk.text,
					entry.chunk.start,
					entry.chunk.end,
					encodeVector(entry.vector),
				);
			});
		});
		writeAll();
	} finally {
		db.close();
	}
}

/**
 * Write the index to `filePath`, replacing any previous file
 */
export async function saveIndex(index: VectorIndex, filePath: string): Promise<void> {
	mkdirSync(dirname(filePath), { recursive: true });

	await withFileLockAsync(filePath, async () => {
		const tmpPath = `${filePath}.tmp-${process.pid}`;
		rmSync(tmpPath, { force: true });

		try {
			writeDatabase(index, tmpPath);
			renameSync(tmpPath, filePath);
		} catch (error) {
			rmSync(tmpPath, { force: true });
			throw error;
		}
	});

	logger.debug(
		{ path: filePath, documents: index.documentCount, entries: index.size, modelId: index.embeddingModelId },
		"Vector index persisted",
	);
}

/**
 * Read an index written by saveIndex()
 *
 * @returns null when no index file exists
 * @throws InvalidConfigurationError for an unknown format version or metric
 */
export function loadIndex(filePath: string): VectorIndex | null {
	if (!existsSync(filePath)) {
		return null;
	}

	const db = new Database(filePath, { readonly: true, fileMustExist: true });
	try {
		const meta = new Map(
			db
				.prepare<[], MetaRow>("SELECT key, value FROM meta")
				.all()
				.map((row): [string, string] => [row.key, row.value]),
		);

		const version = meta.get("format_version");
		if (version !== String(INDEX_FORMAT_VERSION)) {
			throw new InvalidConfigurationError(`Unsupported index format version ${version ?? "(none)"} in ${filePath}`);
		}
		const metric = meta.get("metric");
		if (metric !== METRIC) {
			throw new InvalidConfigurationError(`Unsupported similarity metric ${metric ?? "(none)"} in ${filePath}`);
		}
		const modelId = meta.get("embedding_model_id");
		if (!modelId) {
			throw new InvalidConfigurationError(`Index ${filePath} has no embedding model identity`);
		}
		const dimensionsValue = meta.get("dimensions");
		const dimensions = dimensionsValue ? Number(dimensionsValue) : null;

		const documents = new Map<string, Document>();
		for (const row of db.prepare<[], DocumentRow>("SELECT * FROM documents ORDER BY rowid").all()) {
			if (!isDocumentType(row.type)) {
				throw new InvalidConfigurationError(`Unknown document type ${row.type} in ${filePath}`);
			}
			documents.set(row.fingerprint, {
				fingerprint: row.fingerprint,
				sourceName: row.source_name,
				type: row.type,
				text: row.text,
				chunking: { maxSize: row.max_size, overlap: row.overlap },
				indexedAt: row.indexed_at,
			});
		}

		const entries = db
			.prepare<[], EntryRow>("SELECT * FROM entries ORDER BY position")
			.all()
			.map(
				(row): VectorIndexEntry => ({
					chunk: {
						id: row.chunk_id,
						documentFingerprint: row.document_fingerprint,
						index: row.chunk_index,
						text: row.text,
						start: row.start_offset,
						end: row.end_offset,
					},
					vector: decodeVector(row.vector),
					documentFingerprint: row.document_fingerprint,
					sourceName: row.source_name,
				}),
			);

		const index = new VectorIndex(modelId, dimensions);
		index.insert(entries);
		for (const doc of documents.values()) {
			index.registerDocument(doc);
		}

		logger.debug({ path: filePath, documents: index.documentCount, entries: index.size, modelId }, "Vector index loaded");
		return index;
	} finally {
		db.close();
	}
}
