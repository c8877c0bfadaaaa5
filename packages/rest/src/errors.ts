import { Data } from "effect";
import type { HttpMethod } from "@querykit/core";

// ============================================================================
// Effect TaggedError REST Error Types
// ============================================================================

export class RouteNotFoundError extends Data.TaggedError("RouteNotFoundError")<{
	readonly path: string;
	readonly message: string;
}> {}

export class MethodNotAllowedError extends Data.TaggedError("MethodNotAllowedError")<{
	readonly method: string;
	readonly path: string;
	readonly allowed: ReadonlyArray<HttpMethod>;
	readonly message: string;
}> {}

export class DuplicateRouteError extends Data.TaggedError("DuplicateRouteError")<{
	readonly method: HttpMethod;
	readonly path: string;
	readonly message: string;
}> {}

/**
 * A handler threw, or a conversion threw while decoding its arguments.
 */
export class HandlerError extends Data.TaggedError("HandlerError")<{
	readonly method: HttpMethod;
	readonly path: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

// ============================================================================
// REST Error Union
// ============================================================================

export type RestError =
	| RouteNotFoundError
	| MethodNotAllowedError
	| DuplicateRouteError
	| HandlerError;
