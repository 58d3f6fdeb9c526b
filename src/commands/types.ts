/**
 * Shared types for command modules
 */
import type { Command } from "commander";

/**
 * A group of related subcommands, attached to the root program by cli.ts
 */
export interface CommandModule {
	register(program: Command): void;
}

