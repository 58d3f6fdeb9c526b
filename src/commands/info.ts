/**
 * Info Commands
 *
 * | Command | Purpose                                          |
 * |---------|--------------------------------------------------|
 * | models  | List configured generation and embedding models  |
 * | tools   | List registered tools and their input schemas    |
 */

import type { Command } from "commander";
import { header, info, isHumanMode, list, section } from "../output.js";
import { getRuntime } from "./context.js";
import type { CommandModule } from "./types.js";

function handleModels(_options: unknown, command: Command): void {
	const { models, config, engine } = getRuntime(command);

	header("Models");
	section("Generation");
	list(
		models
			.list()
			.map((m) => `${m.id} (${m.backend}${m.model ? `: ${m.model}` : ""})${m.id === models.defaultModelId ? " [default]" : ""}`),
	);

	section("Embedding");
	list(
		config.embedding.models.map(
			(m) => `${m.id} (${m.backend}, ${m.dimensions}d)${m.id === engine.embeddingModelId ? " [index]" : ""}`,
		),
	);
}

function handleTools(_options: unknown, command: Command): void {
	const { tools } = getRuntime(command);
	const registered = tools.list();
	if (registered.length === 0) {
		info("No tools registered");
		return;
	}

	header(`Tools (${registered.length})`);
	for (const tool of registered) {
		section(tool.name);
		info(tool.description, { inputSchema: tool.inputJsonSchema() });
		if (isHumanMode()) {
			console.log(JSON.stringify(tool.inputJsonSchema(), null, 2));
		}
	}
}

export const infoCommands: CommandModule = {
	register(program) {
		program.command("models").description("List configured models").action(handleModels);
		program.command("tools").description("List available tools").action(handleTools);
	},
};
