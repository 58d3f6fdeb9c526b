/**
 * Document Commands
 *
 * | Command        | Purpose                                         |
 * |----------------|-------------------------------------------------|
 * | ingest         | Chunk, embed and index one or more files        |
 * | docs list      | List indexed documents                          |
 * | docs remove    | Remove a document from the index                |
 * | index stats    | Show vector index statistics                    |
 * | index rebuild  | Re-embed every document, optionally new model   |
 * | cache clear    | Remove every ingestion cache entry              |
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { Command } from "commander";
import { errorCode, errorMessage } from "../errors.js";
import { header, IngestProgress, info, keyValue, list, section, success } from "../output.js";
import { fail, getRuntime, parsePositiveInt } from "./context.js";
import type { CommandModule } from "./types.js";

// =============================================================================
// Option Types
// =============================================================================

interface IngestOptions {
	maxSize?: string;
	overlap?: string;
	name?: string;
}

interface RebuildOptions {
	embeddingModel?: string;
}

// =============================================================================
// Handlers
// =============================================================================

async function handleIngest(files: string[], options: IngestOptions, command: Command): Promise<void> {
	const { engine, config } = getRuntime(command);
	const chunking = {
		maxSize: options.maxSize ? parsePositiveInt(options.maxSize, "--max-size") : config.chunking.maxSize,
		overlap: options.overlap ? parsePositiveInt(options.overlap, "--overlap") : config.chunking.overlap,
	};
	if (options.name && files.length > 1) {
		fail("Ingest failed", new Error("--name can only be used with a single file"));
	}

	const progress = new IngestProgress(files.length);
	for (const file of files) {
		const sourceName = options.name ?? basename(file);
		try {
			const bytes = await readFile(file);
			const result = await engine.ingest({ bytes, sourceName, chunking });
			if (result.alreadyIndexed) {
				progress.record(sourceName, "unchanged", "already indexed");
			} else {
				const detail = `${result.chunksIndexed} chunks${result.superseded ? ", replaced previous version" : ""}`;
				progress.record(sourceName, result.fromCache ? "cached" : "indexed", detail);
			}
		} catch (err) {
			progress.record(sourceName, "failed", errorMessage(err), { code: errorCode(err), file });
		}
	}
	if (progress.finish().failed > 0) {
		process.exitCode = 1;
	}
}

function handleList(_options: unknown, command: Command): void {
	const { engine } = getRuntime(command);
	const documents = engine.listDocuments();
	if (documents.length === 0) {
		info("No documents indexed");
		return;
	}

	header(`Indexed Documents (${documents.length})`);
	list(
		documents.map((doc) => {
			const chunks = engine.index.countEntries(doc.fingerprint);
			return `${doc.sourceName} [${doc.type}] - ${chunks} chunks - ${doc.indexedAt.split("T")[0]} - ${doc.fingerprint.slice(0, 12)}`;
		}),
	);
}

async function handleRemove(fingerprint: string, _options: unknown, command: Command): Promise<void> {
	const { engine } = getRuntime(command);
	// Accept a unique fingerprint prefix, as printed by docs list
	const matches = engine.listDocuments().filter((doc) => doc.fingerprint.startsWith(fingerprint));
	if (matches.length !== 1) {
		fail(
			"Remove failed",
			new Error(matches.length === 0 ? `no document matches ${fingerprint}` : `${fingerprint} is ambiguous`),
		);
	}
	try {
		await engine.removeDocument(matches[0].fingerprint);
		success(`Removed ${matches[0].sourceName}`);
	} catch (err) {
		fail("Remove failed", err);
	}
}

function handleStats(_options: unknown, command: Command): void {
	const { engine } = getRuntime(command);
	const stats = engine.stats();

	header("Vector Index Statistics");
	keyValue("Embedding model", stats.embeddingModelId);
	keyValue("Dimensions", stats.dimensions ?? "unset");
	keyValue("Documents", stats.documentCount);
	keyValue("Entries", stats.entryCount);
	if (stats.documents.length > 0) {
		section("Documents");
		list(stats.documents.map((doc) => `${doc.sourceName}: ${doc.chunkCount} chunks`));
	}
}

async function handleRebuild(options: RebuildOptions, command: Command): Promise<void> {
	const { engine } = getRuntime(command);
	const target = options.embeddingModel ?? engine.embeddingModelId;
	info(`Rebuilding index with ${target}...`);
	try {
		const result = await engine.switchEmbeddingModel(target);
		success(`Index rebuilt: ${result.documents} document(s), ${result.entries} entries`, { ...result });
	} catch (err) {
		fail("Rebuild failed", err);
	}
}

async function handleCacheClear(_options: unknown, command: Command): Promise<void> {
	const { engine } = getRuntime(command);
	try {
		const removed = await engine.clearCache();
		success(`Removed ${removed} cache entr${removed === 1 ? "y" : "ies"}`);
	} catch (err) {
		fail("Cache clear failed", err);
	}
}

// =============================================================================
// Command Module
// =============================================================================

export const documentCommands: CommandModule = {
	register(program) {
		program
			.command("ingest <files...>")
			.description("Chunk, embed and index PDF or text files")
			.option("--max-size <n>", "Maximum chunk size in characters")
			.option("--overlap <n>", "Characters shared by consecutive chunks")
			.option("--name <sourceName>", "Source name to index a single file under")
			.action(handleIngest);

		const docs = program.command("docs").description("Manage indexed documents");
		docs.command("list").description("List indexed documents").action(handleList);
		docs
			.command("remove <fingerprint>")
			.description("Remove a document by fingerprint (or unique prefix)")
			.action(handleRemove);

		const index = program.command("index").description("Inspect or rebuild the vector index");
		index.command("stats").description("Show index statistics").action(handleStats);
		index
			.command("rebuild")
			.description("Re-embed every document, optionally with another embedding model")
			.option("-e, --embedding-model <id>", "Embedding model to switch to")
			.action(handleRebuild);

		const cache = program.command("cache").description("Manage the ingestion cache");
		cache.command("clear").description("Remove every cache entry").action(handleCacheClear);
	},
};
