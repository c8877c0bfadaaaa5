import { encodeRequest } from "../interpreters/client.js";
import { serveQuery } from "../interpreters/server.js";
import type { Node, QueryCombinator, RouteDescriptor } from "./route-descriptor.js";

/**
 * Put `combinator` in front of `next`. The resulting route's handler takes
 * the combinator's value first, then the arguments of `next`.
 *
 * @example
 * ```typescript
 * const search = param(
 *   queryParam("author", text),
 *   param(queryFlag("published"), endpoint({ path: "/books" })),
 * )
 * // handler: (author: Option<string>, published: boolean) => ...
 * ```
 */
export const param = <A, Rest extends Array<unknown>>(
	combinator: QueryCombinator<A>,
	next: RouteDescriptor<Rest>,
): Node<[A, ...Rest]> => ({
	_tag: "Node",
	combinator,
	next,
	serve: (query, handler) =>
		combinator.serve(query, (value) =>
			serveQuery(next, query, (...rest) => handler(value, ...rest)),
		),
	encode: (request, [value, ...rest]) =>
		combinator.encode(request, value, (updated) => encodeRequest(next, updated, rest)),
});
