/**
 * Tool Capability
 *
 * A tool is a named operation with a zod input schema. The agent hands it
 * untrusted arguments; validation happens inside `invoke`, so a tool never
 * runs with input its schema rejects.
 */

import { toJSONSchema, z } from "zod";
import { AppError, ToolInputInvalidError, ToolUnavailableError, errorMessage } from "../errors.js";

export interface ToolInvocationContext {
	signal?: AbortSignal;
}

export interface ToolCapability<TInput = unknown, TResult = unknown> {
	readonly name: string;
	readonly description: string;
	readonly inputSchema: z.ZodType<TInput>;
	/** Input schema as JSON Schema, for model-facing tool descriptions */
	inputJsonSchema(): Record<string, unknown>;
	/**
	 * @throws ToolInputInvalidError when `args` fail the schema or cannot be resolved
	 * @throws ToolUnavailableError when the backing service fails
	 */
	invoke(args: unknown, context?: ToolInvocationContext): Promise<TResult>;
}

/**
 * Outcome of one tool call as recorded on the assistant turn
 */
export type ToolOutcome = { ok: true; result: unknown } | { ok: false; error: { code: string; message: string } };

export interface ToolInvocationRecord {
	toolName: string;
	arguments: unknown;
	outcome: ToolOutcome;
	timestamp: string;
	durationMs: number;
}

/**
 * A tool call chosen by the classifier
 */
export interface ToolCall {
	toolName: string;
	arguments: Record<string, unknown>;
}

export interface ToolDefinition<TSchema extends z.ZodType, TResult> {
	name: string;
	description: string;
	inputSchema: TSchema;
	run(input: z.output<TSchema>, context: ToolInvocationContext): Promise<TResult>;
}

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.map(String).join(".");
		return path ? `${path}: ${issue.message}` : issue.message;
	});
}

/**
 * Build a ToolCapability that validates its input before running
 *
 * Failures that are not already AppErrors surface as ToolUnavailableError,
 * except aborts, which are rethrown unchanged.
 */
export function defineTool<TSchema extends z.ZodType<z.output<TSchema>>, TResult>(
	definition: ToolDefinition<TSchema, TResult>,
): ToolCapability<z.output<TSchema>, TResult> {
	const { name, description, inputSchema } = definition;

	return {
		name,
		description,
		inputSchema,
		inputJsonSchema: () => toJSONSchema(inputSchema) as Record<string, unknown>,
		async invoke(args, context = {}) {
			const parsed = inputSchema.safeParse(args);
			if (!parsed.success) {
				const issues = formatIssues(parsed.error);
				throw new ToolInputInvalidError(`Invalid input for ${name}: ${issues.join("; ")}`, name, issues);
			}
			try {
				return await definition.run(parsed.data, context);
			} catch (error) {
				if (error instanceof AppError || context.signal?.aborted) {
					throw error;
				}
				throw new ToolUnavailableError(`${name} failed: ${errorMessage(error)}`, name);
			}
		},
	};
}
