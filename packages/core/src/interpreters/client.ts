/**
 * Client interpreter: encodes call arguments into an outgoing request.
 *
 * @module
 */

import { makeRequest, type OutgoingRequest } from "../query-string/outgoing-request.js";
import { endpointOf, type RouteDescriptor } from "../route/route-descriptor.js";

/**
 * Append one query contribution per combinator of `route` to `request`.
 */
export const encodeRequest = <Args extends Array<unknown>>(
	route: RouteDescriptor<Args>,
	request: OutgoingRequest,
	args: Args,
): OutgoingRequest => (route._tag === "Leaf" ? request : route.encode(request, args));

/**
 * Build a calling function for `route`. Unless a base request is given, each
 * call starts from an empty request for the route's method and path.
 *
 * @example
 * ```typescript
 * const route = param(queryParams("tag", text), endpoint({ path: "/books" }))
 * toUrl(client(route)(["sf", "classic"]))
 * // → "/books?tag=sf&tag=classic"
 * ```
 */
export const client = <Args extends Array<unknown>>(
	route: RouteDescriptor<Args>,
	base?: OutgoingRequest,
): ((...args: Args) => OutgoingRequest) => {
	const start = base ?? defaultRequest(route);
	return (...args) => encodeRequest(route, start, args);
};

const defaultRequest = <Args extends Array<unknown>>(
	route: RouteDescriptor<Args>,
): OutgoingRequest => {
	const { method, path } = endpointOf(route);
	return makeRequest(method, path);
};
