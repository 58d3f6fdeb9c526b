/**
 * Shared runtime access for command modules
 *
 * Global flags are read from the root program, configuration is loaded once
 * per process, and every handler reports failures the same way.
 */

import type { Command } from "commander";
import { loadConfig } from "../config.js";
import { errorCode, errorMessage } from "../errors.js";
import { configureOutput, error } from "../output.js";
import { createRuntime, type Runtime } from "../runtime.js";

export interface GlobalOptions {
	stateDir?: string;
	human?: boolean;
	verbose?: boolean;
}

let runtime: Runtime | null = null;

/**
 * Build (or reuse) the runtime for the current invocation
 */
export function getRuntime(command: Command): Runtime {
	if (runtime) {
		return runtime;
	}
	const options = command.optsWithGlobals<GlobalOptions>();
	configureOutput({
		...(options.human ? { mode: "human" } : {}),
		...(options.verbose ? { verbose: true } : {}),
	});
	const { config } = loadConfig({
		overrides: options.stateDir ? { stateDir: options.stateDir } : undefined,
	});
	runtime = createRuntime(config);
	return runtime;
}

/**
 * Report a handler failure and exit non-zero
 */
export function fail(context: string, err: unknown): never {
	error(`${context}: ${errorMessage(err)}`, { code: errorCode(err) });
	process.exit(1);
}

/**
 * Parse a positive integer flag
 */
export function parsePositiveInt(value: string, flag: string): number {
	const parsed = Number.parseInt(value, 10);
	if (!Number.isInteger(parsed) || parsed < 1) {
		fail(`Invalid ${flag}`, new Error(`expected a positive integer, got "${value}"`));
	}
	return parsed;
}
