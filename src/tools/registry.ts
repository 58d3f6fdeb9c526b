/**
 * Tool Registry
 *
 * Looks tools up by name and runs calls under a time budget. `run` never
 * throws: every call, successful or not, comes back as a ToolInvocationRecord
 * so a failing tool cannot abort the turn that asked for it.
 */

import { withTimeout } from "../concurrency.js";
import { InvalidConfigurationError, TimeoutError, ToolTimeoutError, ToolUnavailableError, errorCode, errorMessage } from "../errors.js";
import { toolLogger } from "../logger.js";
import type { ToolCall, ToolCapability, ToolInvocationRecord } from "./types.js";

const logger = toolLogger.child({ component: "registry" });

export interface RunToolOptions {
	timeoutMs: number;
	signal?: AbortSignal;
}

export class ToolRegistry {
	private readonly tools = new Map<string, ToolCapability>();

	constructor(tools: ToolCapability[] = []) {
		for (const tool of tools) {
			this.register(tool);
		}
	}

	/**
	 * @throws InvalidConfigurationError when the name is taken
	 */
	register(tool: ToolCapability): void {
		if (this.tools.has(tool.name)) {
			throw new InvalidConfigurationError(`Tool "${tool.name}" is already registered`, "name");
		}
		this.tools.set(tool.name, tool);
	}

	get(name: string): ToolCapability | undefined {
		return this.tools.get(name);
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	list(): ToolCapability[] {
		return [...this.tools.values()];
	}

	/**
	 * Invoke one call and record its outcome
	 */
	async run(call: ToolCall, options: RunToolOptions): Promise<ToolInvocationRecord> {
		const timestamp = new Date().toISOString();
		const started = Date.now();
		const record = (outcome: ToolInvocationRecord["outcome"]): ToolInvocationRecord => ({
			toolName: call.toolName,
			arguments: call.arguments,
			outcome,
			timestamp,
			durationMs: Date.now() - started,
		});

		try {
			const tool = this.tools.get(call.toolName);
			if (!tool) {
				throw new ToolUnavailableError(`Unknown tool "${call.toolName}"`, call.toolName);
			}
			const result = await withTimeout(
				call.toolName,
				options.timeoutMs,
				(signal) => tool.invoke(call.arguments, { signal }),
				options.signal,
			);
			logger.info({ tool: call.toolName, durationMs: Date.now() - started }, "Tool call succeeded");
			return record({ ok: true, result });
		} catch (caught) {
			const error =
				caught instanceof TimeoutError
					? new ToolTimeoutError(
							`${call.toolName} did not respond within ${options.timeoutMs}ms`,
							call.toolName,
							options.timeoutMs,
						)
					: caught;
			logger.warn({ tool: call.toolName, code: errorCode(error), error: errorMessage(error) }, "Tool call failed");
			return record({ ok: false, error: { code: errorCode(error), message: errorMessage(error) } });
		}
	}
}
