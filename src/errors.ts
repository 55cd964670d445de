// SPDX-License-Identifier: MIT
// Corvid Error Types
// Internal errors of the analyzer and the validation result shape

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Analyzer invariants
	InvariantViolation: "InvariantViolation",
	UnknownWorker: "UnknownWorker",
	UnknownNodeKind: "UnknownNodeKind",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Analyzer Error Class
//==============================================================================

/**
 * Thrown for programmer errors inside the analyzer. User-facing problems are
 * reported as diagnostics, never as exceptions.
 */
export class AnalyzerError extends Error {
	readonly code: ErrorCode;
	readonly meta?: Map<string, string>;

	constructor(code: ErrorCode, message: string, meta?: Map<string, string>) {
		super(message);
		this.name = "AnalyzerError";
		this.code = code;
		if (meta !== undefined) this.meta = meta;
	}

	/**
	 * Create an InvariantViolation error
	 */
	static invariant(message: string): AnalyzerError {
		return new AnalyzerError(
			ErrorCodes.InvariantViolation,
			"Invariant violation: " + message,
		);
	}

	static unknownWorker(name: string): AnalyzerError {
		return new AnalyzerError(
			ErrorCodes.UnknownWorker,
			"Unknown worker: " + name,
			new Map([["worker", name]]),
		);
	}

	static unknownNodeKind(kind: string): AnalyzerError {
		return new AnalyzerError(
			ErrorCodes.UnknownNodeKind,
			"Unknown node kind: " + kind,
			new Map([["kind", kind]]),
		);
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (stmt.kind) {
 *   case "block": return ...;
 *   case "return": return ...;
 *   default:
 *     exhaustive(stmt); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw AnalyzerError.unknownNodeKind(describeUnknown(value));
}

function describeUnknown(value: unknown): string {
	if (typeof value === "object" && value !== null && "kind" in value) {
		return String(value.kind);
	}
	return String(value);
}
