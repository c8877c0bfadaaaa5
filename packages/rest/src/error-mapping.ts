/**
 * Error-to-HTTP-status mapping for REST API responses.
 *
 * Maps tagged errors to HTTP status codes and structured error response
 * bodies. Each error's _tag is the discriminant, and the response includes
 * the error's fields for debugging.
 *
 * @module
 */

import { Cause, Option, Runtime } from "effect";

// ============================================================================
// Types
// ============================================================================

/**
 * Structured error response returned by mapErrorToResponse.
 * Contains the HTTP status code and the response body to send.
 */
export interface ErrorResponse {
	/** HTTP status code (e.g., 404, 405, 500) */
	readonly status: number;

	/** Response body containing error details */
	readonly body: {
		/** Error tag identifying the error type */
		readonly _tag: string;
		/** Human-readable error message */
		readonly error: string;
		/** Additional error fields for debugging */
		readonly details?: Record<string, unknown>;
	};
}

interface TaggedFields {
	readonly _tag: string;
	readonly fields: Record<string, unknown>;
}

const toTaggedFields = (value: unknown): TaggedFields | null => {
	if (
		value === null ||
		typeof value !== "object" ||
		!("_tag" in value) ||
		typeof value._tag !== "string"
	) {
		return null;
	}
	// Error#message is an own but non-enumerable property
	const message = value instanceof Error && value.message !== "" ? { message: value.message } : {};
	return {
		_tag: value._tag,
		fields: {
			...Object.fromEntries(Object.entries(value).filter(([key]) => key !== "_tag")),
			...message,
		},
	};
};

/**
 * Extract a tagged error from an unknown error value.
 *
 * Effect.runPromise throws a FiberFailure when the Effect fails.
 * This function extracts the underlying tagged error from the FiberFailure
 * or returns the error directly if it's already a tagged error.
 */
const extractTaggedError = (error: unknown): TaggedFields | null => {
	if (Runtime.isFiberFailure(error)) {
		const failure = Cause.failureOption(error[Runtime.FiberFailureCauseId]);
		if (Option.isSome(failure)) {
			return toTaggedFields(failure.value);
		}
	}

	return toTaggedFields(error);
};

// ============================================================================
// Status Code Mapping
// ============================================================================

/**
 * Static mapping from error _tag values to HTTP status codes.
 *
 * - 404 Not Found: RouteNotFoundError
 * - 405 Method Not Allowed: MethodNotAllowedError
 * - 500 Internal Server Error: HandlerError, construction errors and unknown errors
 */
const ERROR_STATUS_MAP: Record<string, number> = {
	RouteNotFoundError: 404,
	MethodNotAllowedError: 405,
	HandlerError: 500,
	DuplicateRouteError: 500,
	InvalidParamNameError: 500,
};

/**
 * Human-readable error messages for each error type.
 */
const ERROR_MESSAGES: Record<string, string> = {
	RouteNotFoundError: "Route not found",
	MethodNotAllowedError: "Method not allowed",
	HandlerError: "Handler error",
	DuplicateRouteError: "Duplicate route",
	InvalidParamNameError: "Invalid parameter name",
};

const STATUS_MESSAGES: Record<number, string> = {
	400: "Bad request",
	401: "Unauthorized",
	403: "Forbidden",
	404: "Not found",
	409: "Conflict",
	422: "Unprocessable entity",
};

// ============================================================================
// Error Mapping Function
// ============================================================================

/**
 * Map a tagged error to an HTTP response.
 *
 * Matches on the error's `_tag` property and returns the appropriate HTTP
 * status code along with a structured error body. `statusOverrides` adds or
 * replaces entries of the status table for application-defined tags.
 * Unknown errors default to 500 Internal Server Error.
 *
 * @example
 * ```typescript
 * import { mapErrorToResponse, RouteNotFoundError } from "@querykit/rest"
 *
 * const response = mapErrorToResponse(
 *   new RouteNotFoundError({ path: "/nope", message: "No route for /nope" }),
 * )
 * // response = {
 * //   status: 404,
 * //   body: {
 * //     _tag: "RouteNotFoundError",
 * //     error: "Route not found",
 * //     details: { path: "/nope", message: "No route for /nope" }
 * //   }
 * // }
 * ```
 */
export const mapErrorToResponse = (
	error: unknown,
	statusOverrides: Readonly<Record<string, number>> = {},
): ErrorResponse => {
	const taggedError = extractTaggedError(error);

	if (taggedError !== null) {
		const tag = taggedError._tag;
		const status = statusOverrides[tag] ?? ERROR_STATUS_MAP[tag] ?? 500;
		const errorMessage =
			ERROR_MESSAGES[tag] ?? STATUS_MESSAGES[status] ?? "Internal server error";
		const { fields } = taggedError;

		return {
			status,
			body: {
				_tag: tag,
				error: errorMessage,
				...(Object.keys(fields).length > 0 ? { details: fields } : {}),
			},
		};
	}

	if (error instanceof Error) {
		return {
			status: 500,
			body: {
				_tag: "UnknownError",
				error: "Internal server error",
				details: {
					message: error.message,
					name: error.name,
				},
			},
		};
	}

	return {
		status: 500,
		body: {
			_tag: "UnknownError",
			error: "Internal server error",
		},
	};
};
