#!/usr/bin/env node

/**
 * rag-agent CLI
 *
 * Local retrieval-augmented question answering over your own documents.
 *
 * Commands:
 *   ingest <files...>  Chunk, embed and index PDF or text files
 *   ask <question...>  Answer one question
 *   chat               Interactive conversation
 *   docs               List or remove indexed documents
 *   index              Index statistics, rebuild with another embedding model
 *   cache              Clear the ingestion cache
 *   history            Export or clear the conversation
 *   models             List configured models
 *   tools              List available tools
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { chatCommands } from "./commands/chat.js";
import { fail } from "./commands/context.js";
import { documentCommands } from "./commands/documents.js";
import { infoCommands } from "./commands/info.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Get version from package.json
function getVersion(): string {
	try {
		const pkgPath = join(__dirname, "..", "package.json");
		const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch {
		// Running from an unpacked tree without package.json
	}
	return "0.1.0";
}

const program = new Command();

program
	.name("rag-agent")
	.description("Local RAG agent: ask questions about your documents, with tools for live data")
	.version(getVersion())
	.option("--state-dir <dir>", "Directory holding the index, cache and history")
	.option("--human", "Human-readable output instead of JSON lines")
	.option("-v, --verbose", "Show event details and model reasoning");

for (const commands of [documentCommands, chatCommands, infoCommands]) {
	commands.register(program);
}

program.parseAsync(process.argv).catch((err: unknown) => fail("Command failed", err));
