// Lexicon Error Types
// Error domain for schema and data validation

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// The schema document itself is malformed
	InvalidSchema: "InvalidSchema",

	// A data value does not conform to an otherwise valid schema
	DataValidation: "DataValidation",

	// A requested document id is absent from the catalog
	LexiconNotFound: "LexiconNotFound",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const prefixes: Record<ErrorCode, string> = {
	InvalidSchema: "Invalid lexicon schema: ",
	DataValidation: "Data validation failed: ",
	LexiconNotFound: "Lexicon not found for collection: ",
};

//==============================================================================
// Lexicon Error Class
//==============================================================================

export class LexiconError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = "LexiconError";
		this.code = code;
	}

	/**
	 * Render the error with its stable, human-readable prefix.
	 */
	override toString(): string {
		return prefixes[this.code] + this.message;
	}

	/**
	 * Create an InvalidSchema error
	 */
	static invalidSchema(message: string): LexiconError {
		return new LexiconError(ErrorCodes.InvalidSchema, message);
	}

	/**
	 * Create a DataValidation error
	 */
	static dataValidation(message: string): LexiconError {
		return new LexiconError(ErrorCodes.DataValidation, message);
	}

	/**
	 * Create a LexiconNotFound error. The message is the missing document id.
	 */
	static lexiconNotFound(id: string): LexiconError {
		return new LexiconError(ErrorCodes.LexiconNotFound, id);
	}
}

export function isLexiconError(error: unknown): error is LexiconError {
	return error instanceof LexiconError;
}

//==============================================================================
// Validation Result Type
//==============================================================================

export type ValidationResult<T, E = LexiconError> =
	| { valid: true; value: T }
	| { valid: false; error: E };

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): { valid: true; value: T } {
	return { valid: true, value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<E>(error: E): { valid: false; error: E } {
	return { valid: false, error };
}

/**
 * Run a throwing validation step and capture a LexiconError as a failed
 * result. Any other exception propagates.
 */
export function capture<T>(fn: () => T): ValidationResult<T> {
	try {
		return validResult(fn());
	} catch (error) {
		if (isLexiconError(error)) {
			return invalidResult(error);
		}
		throw error;
	}
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (schema.type) {
 *   case "string": return ...;
 *   case "integer": return ...;
 *   default:
 *     exhaustive(schema); // Type error if a variant is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
