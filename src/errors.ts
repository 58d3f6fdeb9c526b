/**
 * Custom Error Classes
 *
 * Domain-specific error types with proper Error subclassing and context properties.
 * All custom error classes in the application extend the base AppError class.
 *
 * Failures local to one document or one tool are reported per item; generation
 * failures end the turn but are recorded on the conversation. Nothing in the
 * core retries automatically.
 */

/**
 * Base application error class
 *
 * Uses Object.setPrototypeOf() to ensure instanceof checks work correctly
 * after transpilation.
 *
 * @param message - Error message
 * @param code - Error code for categorization (e.g., 'INVALID_CONFIGURATION')
 *
 * @example
 * ```typescript
 * throw new AppError('Something went wrong', 'GENERIC_ERROR');
 * ```
 */
export class AppError extends Error {
	constructor(
		message: string,
		public readonly code: string,
	) {
		super(message);
		this.name = "AppError";
		// Critical for instanceof checks in transpiled code
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

/**
 * Invalid configuration error
 *
 * Thrown for bad chunking parameters, unknown model identities, malformed
 * config files and other caller errors. Never retried.
 *
 * @param message - Error message describing the problem
 * @param field - The setting or parameter at fault
 * @param issues - Optional list of individual validation issues
 *
 * @example
 * ```typescript
 * if (overlap >= maxSize) {
 *   throw new InvalidConfigurationError('overlap must be smaller than maxSize', 'overlap');
 * }
 * ```
 */
export class InvalidConfigurationError extends AppError {
	constructor(
		message: string,
		public readonly field?: string,
		public readonly issues?: string[],
	) {
		super(message, "INVALID_CONFIGURATION");
		this.name = "InvalidConfigurationError";
		Object.setPrototypeOf(this, InvalidConfigurationError.prototype);
	}
}

/**
 * Unsupported document format
 *
 * @param message - Error message
 * @param sourceName - Name of the rejected document
 */
export class UnsupportedFormatError extends AppError {
	constructor(
		message: string,
		public readonly sourceName?: string,
	) {
		super(message, "UNSUPPORTED_FORMAT");
		this.name = "UnsupportedFormatError";
		Object.setPrototypeOf(this, UnsupportedFormatError.prototype);
	}
}

/**
 * Embedding backend could not produce vectors
 *
 * A failure of any batch fails the whole embedding call so that a document is
 * never indexed partially.
 *
 * @param message - Error message
 * @param modelId - Embedding model identity that failed
 */
export class EmbeddingUnavailableError extends AppError {
	constructor(
		message: string,
		public readonly modelId: string,
	) {
		super(message, "EMBEDDING_UNAVAILABLE");
		this.name = "EmbeddingUnavailableError";
		Object.setPrototypeOf(this, EmbeddingUnavailableError.prototype);
	}
}

/**
 * Vector dimensions disagree with what the provider or index declares
 *
 * @param message - Error message
 * @param expected - Declared dimension
 * @param actual - Observed dimension (or vector count, for count mismatches)
 */
export class DimensionMismatchError extends AppError {
	constructor(
		message: string,
		public readonly expected: number,
		public readonly actual: number,
	) {
		super(message, "DIMENSION_MISMATCH");
		this.name = "DimensionMismatchError";
		Object.setPrototypeOf(this, DimensionMismatchError.prototype);
	}
}

/**
 * Generation backend failed
 *
 * @param message - Error message
 * @param modelId - Generation model identity
 */
export class GenerationUnavailableError extends AppError {
	constructor(
		message: string,
		public readonly modelId: string,
	) {
		super(message, "GENERATION_UNAVAILABLE");
		this.name = "GenerationUnavailableError";
		Object.setPrototypeOf(this, GenerationUnavailableError.prototype);
	}
}

/**
 * Generation exceeded its time budget
 *
 * @param message - Error message
 * @param modelId - Generation model identity
 * @param timeoutMs - Timeout duration in milliseconds
 */
export class GenerationTimeoutError extends AppError {
	constructor(
		message: string,
		public readonly modelId: string,
		public readonly timeoutMs: number,
	) {
		super(message, "GENERATION_TIMEOUT");
		this.name = "GenerationTimeoutError";
		Object.setPrototypeOf(this, GenerationTimeoutError.prototype);
	}
}

/**
 * Generation was cancelled by the caller
 */
export class GenerationCancelledError extends AppError {
	constructor(
		message: string,
		public readonly modelId: string,
	) {
		super(message, "GENERATION_CANCELLED");
		this.name = "GenerationCancelledError";
		Object.setPrototypeOf(this, GenerationCancelledError.prototype);
	}
}

/**
 * Tool arguments failed validation, or the tool could not resolve them
 *
 * @param message - Error message
 * @param toolName - Tool that rejected the input
 * @param issues - Optional list of individual validation issues
 */
export class ToolInputInvalidError extends AppError {
	constructor(
		message: string,
		public readonly toolName: string,
		public readonly issues?: string[],
	) {
		super(message, "TOOL_INPUT_INVALID");
		this.name = "ToolInputInvalidError";
		Object.setPrototypeOf(this, ToolInputInvalidError.prototype);
	}
}

/**
 * Tool backend unreachable or not configured
 */
export class ToolUnavailableError extends AppError {
	constructor(
		message: string,
		public readonly toolName: string,
	) {
		super(message, "TOOL_UNAVAILABLE");
		this.name = "ToolUnavailableError";
		Object.setPrototypeOf(this, ToolUnavailableError.prototype);
	}
}

/**
 * Tool invocation exceeded its time budget
 */
export class ToolTimeoutError extends AppError {
	constructor(
		message: string,
		public readonly toolName: string,
		public readonly timeoutMs: number,
	) {
		super(message, "TOOL_TIMEOUT");
		this.name = "ToolTimeoutError";
		Object.setPrototypeOf(this, ToolTimeoutError.prototype);
	}
}

/**
 * Generic timeout for an awaited operation
 *
 * @param message - Error message describing the timeout
 * @param operation - The operation that timed out (e.g., 'retrieval')
 * @param timeoutMs - Timeout duration in milliseconds
 */
export class TimeoutError extends AppError {
	constructor(
		message: string,
		public readonly operation: string,
		public readonly timeoutMs: number,
	) {
		super(message, "TIMEOUT_ERROR");
		this.name = "TimeoutError";
		Object.setPrototypeOf(this, TimeoutError.prototype);
	}
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Error code for an unknown thrown value, "UNKNOWN_ERROR" for foreign errors
 */
export function errorCode(error: unknown): string {
	return error instanceof AppError ? error.code : "UNKNOWN_ERROR";
}
