/**
 * Single entry point dispatching requests to routes by path, then method.
 *
 * @module
 */

import { Effect, Logger, LogLevel } from "effect";
import type { HttpMethod } from "@querykit/core";
import {
	DuplicateRouteError,
	MethodNotAllowedError,
	RouteNotFoundError,
	type RestError,
} from "./errors.js";
import {
	respondWithError,
	routeKey,
	type RestHandler,
	type RestRequest,
	type RestResponse,
	type RestRoute,
} from "./handlers.js";

export interface RequestHandlerOptions {
	/** Prefix stripped from request paths before matching (e.g. "/api") */
	readonly basePath?: string;

	/** Minimum level for dispatch log output. Defaults to Info. */
	readonly logLevel?: LogLevel.LogLevel;
}

/**
 * Combine routes into one handler. Paths are matched exactly after
 * `basePath` is stripped.
 *
 * - unknown path → 404 RouteNotFoundError
 * - known path, other method → 405 MethodNotAllowedError with an `Allow` header
 *
 * @throws DuplicateRouteError when two routes share method and path
 */
export const createRequestHandler = (
	routes: ReadonlyArray<RestRoute>,
	options: RequestHandlerOptions = {},
): RestHandler => {
	const basePath = normalizeBasePath(options.basePath ?? "");
	const table = new Map<string, Map<HttpMethod, RestHandler>>();

	for (const route of routes) {
		const methods = table.get(route.path) ?? new Map<HttpMethod, RestHandler>();
		if (methods.has(route.method)) {
			throw new DuplicateRouteError({
				method: route.method,
				path: route.path,
				message: `Route ${routeKey(route.method, route.path)} is defined more than once`,
			});
		}
		methods.set(route.method, route.handler);
		table.set(route.path, methods);
	}

	const reject = (req: RestRequest, error: RestError, headers?: Record<string, string>) =>
		Effect.runPromise(
			respondWithError(error).pipe(
				Effect.map((response): RestResponse => (headers ? { ...response, headers } : response)),
				Effect.annotateLogs({ method: req.method, path: req.path }),
				Logger.withMinimumLogLevel(options.logLevel ?? LogLevel.Info),
			),
		);

	return (req: RestRequest): Promise<RestResponse> => {
		const path = stripBasePath(basePath, req.path);
		const methods = path === undefined ? undefined : table.get(path);

		if (path === undefined || methods === undefined) {
			return reject(
				req,
				new RouteNotFoundError({ path: req.path, message: `No route for ${req.path}` }),
			);
		}

		const handler = methods.get(req.method);
		if (handler === undefined) {
			const allowed = Array.from(methods.keys());
			return reject(
				req,
				new MethodNotAllowedError({
					method: req.method,
					path: req.path,
					allowed,
					message: `${req.method} is not allowed on ${req.path}`,
				}),
				{ Allow: allowed.join(", ") },
			);
		}

		return handler({ ...req, path });
	};
};

const normalizeBasePath = (basePath: string): string =>
	basePath.endsWith("/") ? basePath.slice(0, -1) : basePath;

const stripBasePath = (basePath: string, path: string): string | undefined => {
	if (basePath === "") return path;
	if (path === basePath) return "/";
	return path.startsWith(`${basePath}/`) ? path.slice(basePath.length) : undefined;
};

/**
 * Split a request URL into a RestRequest. A `#fragment` is dropped.
 *
 * @example
 * ```typescript
 * toRestRequest("GET", "/books?tag=sf&published")
 * // → { method: "GET", path: "/books", rawQuery: "tag=sf&published" }
 * ```
 */
export const toRestRequest = (method: HttpMethod, url: string): RestRequest => {
	const hash = url.indexOf("#");
	const target = hash === -1 ? url : url.slice(0, hash);
	const mark = target.indexOf("?");
	return mark === -1
		? { method, path: target, rawQuery: "" }
		: { method, path: target.slice(0, mark), rawQuery: target.slice(mark + 1) };
};
