/**
 * Error types for basketstats.
 *
 * Core computations fail synchronously with one of these; they never
 * return NaN or Infinity in place of a precondition violation.
 */

/**
 * Precondition violations reported by the core.
 */
export type InvalidInputCode = "empty_corpus" | "identical_items";

/**
 * Error thrown when a computation is called with input it cannot handle.
 */
export class InvalidInputError extends Error {
	constructor(
		public readonly code: InvalidInputCode,
		message: string,
	) {
		super(message);
		this.name = "InvalidInputError";
	}
}

/**
 * Error thrown when a dataset file fails to parse or validate.
 */
export class DatasetValidationError extends Error {
	constructor(
		public readonly filePath: string,
		public readonly issues: string[],
	) {
		super(`Validation failed for ${filePath}:\n${issues.join("\n")}`);
		this.name = "DatasetValidationError";
	}
}
