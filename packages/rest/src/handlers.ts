/**
 * REST handler generation for route descriptors.
 *
 * Binds route descriptors to Effect handlers and turns them into
 * framework-agnostic HTTP handlers. Each request's query string is decoded
 * by the server interpreter into the handler's arguments.
 *
 * @module
 */

import { Effect, Logger, LogLevel } from "effect";
import {
	endpointOf,
	parseEncodedQuery,
	serveQuery,
	type EndpointInfo,
	type HttpMethod,
	type ParsedQuery,
	type RouteDescriptor,
	type RouteShape,
} from "@querykit/core";
import { mapErrorToResponse } from "./error-mapping.js";
import { DuplicateRouteError, HandlerError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Framework-agnostic request object shape.
 * Adapters for specific frameworks (Express, Hono, node:http) convert their
 * native request objects to this shape before invoking handlers.
 */
export interface RestRequest {
	readonly method: HttpMethod;

	/** URL path without the query string (e.g. "/books") */
	readonly path: string;

	/**
	 * Query string as received, still percent-encoded, with or without the
	 * leading "?". Example: "author=Le+Guin&tag[]=sf&published"
	 */
	readonly rawQuery: string;
}

/**
 * Framework-agnostic response object shape.
 * Handlers return this shape; framework adapters convert it to native responses.
 */
export interface RestResponse {
	/** HTTP status code (e.g., 200, 404, 405, 500) */
	readonly status: number;

	/** Response body to serialize as JSON */
	readonly body: unknown;

	/** Optional additional headers */
	readonly headers?: Record<string, string>;
}

/**
 * Framework-agnostic HTTP handler function.
 * Receives a request object and returns a promise resolving to a response object.
 */
export type RestHandler = (req: RestRequest) => Promise<RestResponse>;

/**
 * Route returned by createRestHandlers.
 */
export interface RestRoute {
	readonly method: HttpMethod;
	readonly path: string;
	readonly handler: RestHandler;
}

/**
 * A route descriptor bound to its handler, with the argument types erased.
 */
export interface RestEndpoint {
	readonly endpoint: EndpointInfo;
	readonly route: RouteShape;
	readonly run: (query: ParsedQuery) => Effect.Effect<unknown, unknown>;
}

export interface RestHandlerOptions {
	/** Extra `_tag` → status entries for errors the handlers fail with */
	readonly errorStatus?: Readonly<Record<string, number>>;

	/** Minimum level for the handlers' log output. Defaults to Info. */
	readonly logLevel?: LogLevel.LogLevel;
}

// ============================================================================
// Binding
// ============================================================================

/**
 * What a bound handler may return: an Effect, a Promise, or a plain value.
 */
export type HandlerResult<A, E = never> = Effect.Effect<A, E> | PromiseLike<A> | A;

const isEffectResult = <A, E>(result: HandlerResult<A, E>): result is Effect.Effect<A, E> =>
	Effect.isEffect(result);

const isPromiseResult = <A>(result: PromiseLike<A> | A): result is PromiseLike<A> =>
	typeof result === "object" &&
	result !== null &&
	"then" in result &&
	typeof result.then === "function";

/**
 * Lift a handler's result into an Effect. A rejected Promise becomes a
 * defect, reported like a thrown exception.
 */
const toEffect = <A, E>(result: HandlerResult<A, E>): Effect.Effect<unknown, E> => {
	if (isEffectResult(result)) {
		return result;
	}
	if (isPromiseResult(result)) {
		const promise = result;
		return Effect.promise(() => promise);
	}
	return Effect.succeed(result);
};

/**
 * Bind a route descriptor to a handler taking one argument per combinator.
 * The handler may return an Effect, a Promise or a plain value, and may
 * declare fewer parameters than the route decodes.
 *
 * @example
 * ```typescript
 * const search = param(
 *   queryParam("author", text),
 *   param(queryFlag("published"), endpoint({ path: "/books" })),
 * )
 *
 * const searchBooks = implement(search, (author, published) =>
 *   findBooks(Option.getOrUndefined(author), published),
 * )
 * ```
 */
export const implement = <Args extends Array<unknown>, A, E = never>(
	route: RouteDescriptor<Args>,
	handler: (...args: NoInfer<Args>) => HandlerResult<A, E>,
): RestEndpoint => ({
	endpoint: endpointOf(route),
	route,
	run: (query) =>
		serveQuery(route, query, (...args) =>
			Effect.logDebug("decoded query arguments").pipe(
				Effect.annotateLogs({ arguments: args }),
				Effect.zipRight(Effect.suspend(() => toEffect(handler(...args)))),
			),
		),
});

// ============================================================================
// Handler Factory
// ============================================================================

export const routeKey = (method: HttpMethod, path: string): string => `${method} ${path}`;

/**
 * Create framework-agnostic routes for bound endpoints.
 *
 * Every handler answers 200 with its result as the body. Failures are
 * mapped with mapErrorToResponse; a thrown exception or a rejected Promise
 * becomes a HandlerError (500).
 *
 * @throws DuplicateRouteError when two endpoints share method and path
 *
 * @example
 * ```typescript
 * const routes = createRestHandlers([searchBooks])
 *
 * for (const { method, path, handler } of routes) {
 *   app[method.toLowerCase()](path, async (req, res) => {
 *     const response = await handler({
 *       method,
 *       path: req.path,
 *       rawQuery: req.originalUrl.split("?")[1] ?? "",
 *     })
 *     res.status(response.status).json(response.body)
 *   })
 * }
 * ```
 */
export const createRestHandlers = (
	endpoints: ReadonlyArray<RestEndpoint>,
	options: RestHandlerOptions = {},
): ReadonlyArray<RestRoute> => {
	const seen = new Set<string>();

	return endpoints.map(({ endpoint, run }) => {
		const key = routeKey(endpoint.method, endpoint.path);
		if (seen.has(key)) {
			throw new DuplicateRouteError({
				method: endpoint.method,
				path: endpoint.path,
				message: `Route ${key} is defined more than once`,
			});
		}
		seen.add(key);

		return {
			method: endpoint.method,
			path: endpoint.path,
			handler: createEndpointHandler(endpoint, run, options),
		};
	});
};

const createEndpointHandler = (
	endpoint: EndpointInfo,
	run: RestEndpoint["run"],
	options: RestHandlerOptions,
): RestHandler => {
	return (req: RestRequest): Promise<RestResponse> =>
		Effect.runPromise(
			Effect.suspend(() => run(parseEncodedQuery(req.rawQuery))).pipe(
				Effect.map((body): RestResponse => ({ status: 200, body })),
				Effect.catchAllDefect((defect) =>
					Effect.fail(
						new HandlerError({
							method: endpoint.method,
							path: endpoint.path,
							message: defect instanceof Error ? defect.message : String(defect),
							cause: defect,
						}),
					),
				),
				Effect.catchAll((error) => respondWithError(error, options.errorStatus)),
				Effect.annotateLogs({ method: endpoint.method, path: endpoint.path }),
				Effect.withLogSpan("rest.handler"),
				Logger.withMinimumLogLevel(options.logLevel ?? LogLevel.Info),
			),
		);
};

/**
 * Map a failure to a response, logging server errors at Error level and
 * client errors at Warning level.
 */
export const respondWithError = (
	error: unknown,
	statusOverrides?: Readonly<Record<string, number>>,
): Effect.Effect<RestResponse> => {
	const response = mapErrorToResponse(error, statusOverrides);
	const log =
		response.status >= 500
			? Effect.logError("request failed", response.body)
			: Effect.logWarning("request rejected", response.body);
	return log.pipe(Effect.as(response));
};
