/**
 * @querykit/rest — framework-agnostic REST handlers for querykit routes.
 *
 * Binds route descriptors to Effect handlers, decodes each request's query
 * string into the handler's arguments, and maps failures to HTTP responses.
 *
 * @example
 * ```ts
 * import { createRequestHandler, createRestHandlers, implement } from "@querykit/rest"
 * import { endpoint, param, queryFlag, queryParams, text } from "@querykit/core"
 *
 * const listBooks = param(
 *   queryParams("tag", text),
 *   param(queryFlag("published"), endpoint({ path: "/books" })),
 * )
 *
 * const handle = createRequestHandler(
 *   createRestHandlers([
 *     implement(listBooks, (tags, published) => Effect.succeed(findBooks(tags, published))),
 *   ]),
 * )
 *
 * // GET /books?tag[]=sf&tag[]=classic&published
 * await handle({ method: "GET", path: "/books", rawQuery: "tag[]=sf&tag[]=classic&published" })
 * ```
 *
 * @module
 */

// ============================================================================
// Handler Generation
// ============================================================================

export {
	createRestHandlers,
	implement,
	type HandlerResult,
	respondWithError,
	routeKey,
	type RestEndpoint,
	type RestHandler,
	type RestHandlerOptions,
	type RestRequest,
	type RestResponse,
	type RestRoute,
} from "./handlers.js";

// ============================================================================
// Dispatch
// ============================================================================

export {
	createRequestHandler,
	toRestRequest,
	type RequestHandlerOptions,
} from "./dispatch.js";

// ============================================================================
// Docs
// ============================================================================

export { describeApi } from "./describe.js";

// ============================================================================
// Error Mapping
// ============================================================================

export { type ErrorResponse, mapErrorToResponse } from "./error-mapping.js";

export {
	DuplicateRouteError,
	HandlerError,
	MethodNotAllowedError,
	RouteNotFoundError,
	type RestError,
} from "./errors.js";
