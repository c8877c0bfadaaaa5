/**
 * Server interpreter: decodes a request's query into handler arguments.
 *
 * @module
 */

import { parseQuery, type ParsedQuery } from "../query-string/parse.js";
import type { RouteDescriptor } from "../route/route-descriptor.js";

/**
 * The part of an incoming request this interpreter reads. `rawQuery` is
 * expected to be percent-decoded already.
 */
export interface IncomingRequest {
	readonly rawQuery: string;
}

/**
 * Walk `route` against an already parsed query and call `handler` with one
 * decoded argument per combinator, in chain order. The argument types come
 * from the route alone, so a handler may declare fewer parameters.
 *
 * @example
 * ```typescript
 * const route = param(queryFlag("published"), endpoint({ path: "/books" }))
 * serveQuery(route, parseQuery("published"), (published) => published)
 * // → true
 * ```
 */
export const serveQuery = <Args extends Array<unknown>, R>(
	route: RouteDescriptor<Args>,
	query: ParsedQuery,
	handler: (...args: NoInfer<Args>) => R,
): R => (route._tag === "Leaf" ? route.invoke(handler) : route.serve(query, handler));

/**
 * Parse the request's query once, then serve the route against it.
 */
export const serveRequest = <Args extends Array<unknown>, R>(
	route: RouteDescriptor<Args>,
	request: IncomingRequest,
	handler: (...args: NoInfer<Args>) => R,
): R => serveQuery(route, parseQuery(request.rawQuery), handler);
