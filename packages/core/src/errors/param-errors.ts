import { Data } from "effect";

// ============================================================================
// Effect TaggedError Parameter Error Types
// ============================================================================

/**
 * Raised when a combinator is built with a name that cannot round-trip
 * through a query string.
 */
export class InvalidParamNameError extends Data.TaggedError("InvalidParamNameError")<{
	readonly name: string;
	readonly kind: string;
	readonly message: string;
}> {}
