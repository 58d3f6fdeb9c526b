/**
 * Ollama generation through the local `ollama run` command
 *
 * Used where the HTTP API is not reachable but the ollama binary is on PATH.
 * The command takes a single prompt on stdin, so the system prompt and
 * history are folded into it.
 */

import { spawn } from "node:child_process";
import { GenerationUnavailableError } from "../errors.js";
import { llmLogger } from "../logger.js";
import type { GenerationBackend, GenerationRequest } from "./types.js";

const logger = llmLogger.child({ component: "ollama-cli" });

/**
 * Flatten system prompt, history and prompt into one stdin payload
 */
export function renderCliPrompt(request: GenerationRequest): string {
	const parts: string[] = [];
	if (request.system) {
		parts.push(request.system);
	}
	for (const message of request.history ?? []) {
		parts.push(`${message.role === "user" ? "User" : "Assistant"}: ${message.text}`);
	}
	parts.push(request.history?.length ? `User: ${request.prompt}` : request.prompt);
	return parts.join("\n\n");
}

export class OllamaCliBackend implements GenerationBackend {
	readonly kind = "ollama-cli";

	constructor(private readonly command: string = "ollama") {}

	async generate(model: string, request: GenerationRequest): Promise<string> {
		let output = "";
		for await (const fragment of this.stream(model, request)) {
			output += fragment;
		}
		return output.trim();
	}

	async *stream(model: string, request: GenerationRequest): AsyncGenerator<string> {
		const proc = spawn(this.command, ["run", model], {
			stdio: ["pipe", "pipe", "pipe"],
			signal: request.signal,
		});

		let stderr = "";
		proc.stderr.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		const exited = new Promise<number | null>((resolve, reject) => {
			proc.on("error", reject);
			proc.on("close", (code) => resolve(code));
		});
		// Surfaced through `await exited` below
		exited.catch(() => undefined);

		proc.stdin.on("error", (error) => {
			logger.debug({ model, error: String(error) }, "Failed writing prompt to ollama");
		});
		proc.stdin.write(renderCliPrompt(request));
		proc.stdin.end();

		try {
			for await (const data of proc.stdout) {
				yield String(data);
			}
			const code = await exited;
			if (code !== 0) {
				throw new GenerationUnavailableError(
					`ollama run ${model} failed: ${stderr.trim() || `exit code ${code}`}`,
					model,
				);
			}
		} catch (error) {
			if (request.signal?.aborted || error instanceof GenerationUnavailableError) {
				throw error;
			}
			throw new GenerationUnavailableError(`ollama run ${model} failed: ${String(error)}`, model);
		} finally {
			if (proc.exitCode === null && !proc.killed) {
				proc.kill();
			}
		}
	}
}
