/**
 * Route descriptors: a chain of query-parameter combinators ending in an
 * endpoint.
 *
 * Each combinator kind implements three capabilities, one per interpreter.
 * Every capability does its own work and then calls a continuation that
 * interprets the rest of the chain, so a new kind plugs into all three
 * interpreters without any change to them.
 *
 * @module
 */

import type { DocsRecord } from "../docs/docs-record.js";
import type { OutgoingRequest, HttpMethod } from "../query-string/outgoing-request.js";
import type { ParsedQuery } from "../query-string/parse.js";

// ============================================================================
// Capabilities
// ============================================================================

/**
 * Decode this combinator's value from a parsed query and hand it to the
 * continuation.
 */
export interface ServerInterpretable<A> {
	readonly serve: <R>(query: ParsedQuery, k: (value: A) => R) => R;
}

/**
 * Write `value` into an outgoing request and hand the result to the
 * continuation.
 */
export interface ClientInterpretable<A> {
	readonly encode: <R>(
		request: OutgoingRequest,
		value: A,
		k: (request: OutgoingRequest) => R,
	) => R;
}

/**
 * Register this combinator's documentation and hand the result to the
 * continuation.
 */
export interface DocsInterpretable {
	readonly document: <R>(docs: DocsRecord, k: (docs: DocsRecord) => R) => R;
}

/**
 * What every node exposes regardless of its value type.
 */
export interface CombinatorInfo extends DocsInterpretable {
	/** Open-ended kind tag (e.g. "QueryParam", "QueryFlag") */
	readonly kind: string;
	/** Query key the combinator owns */
	readonly name: string;
}

/**
 * A combinator kind decoding to (and encoding from) values of type `A`.
 */
export interface QueryCombinator<A>
	extends CombinatorInfo,
		ServerInterpretable<A>,
		ClientInterpretable<A> {}

/**
 * Shared configuration accepted by the built-in combinators.
 */
export interface ParamOptions {
	readonly description?: string;
	/** Example values listed in generated docs */
	readonly values?: ReadonlyArray<string>;
}

// ============================================================================
// Descriptors
// ============================================================================

export interface EndpointInfo {
	readonly method: HttpMethod;
	readonly path: string;
	readonly description?: string;
}

/**
 * Untyped view of a chain, enough to walk it for docs and introspection.
 */
export type RouteShape =
	| { readonly _tag: "Leaf"; readonly endpoint: EndpointInfo }
	| {
			readonly _tag: "Node";
			readonly combinator: CombinatorInfo;
			readonly next: RouteShape;
	  };

/**
 * Terminal action of a chain. Only ever built with `Args = []`.
 */
export interface Leaf<Args extends Array<unknown>> {
	readonly _tag: "Leaf";
	readonly endpoint: EndpointInfo;
	readonly invoke: <R>(handler: (...args: Args) => R) => R;
}

/**
 * One combinator followed by the rest of the chain. `Args` is the
 * combinator's value type followed by the argument types of `next`.
 */
export interface Node<Args extends Array<unknown>> {
	readonly _tag: "Node";
	readonly combinator: CombinatorInfo;
	readonly next: RouteShape;
	readonly serve: <R>(query: ParsedQuery, handler: (...args: Args) => R) => R;
	readonly encode: (request: OutgoingRequest, args: Args) => OutgoingRequest;
}

/**
 * A route whose handler takes arguments `Args`, in chain order.
 */
export type RouteDescriptor<Args extends Array<unknown>> = Leaf<Args> | Node<Args>;

/**
 * Handler argument tuple of a route.
 */
export type RouteArgs<Route> = Route extends RouteDescriptor<infer Args extends Array<unknown>>
	? Args
	: never;

/**
 * Build the terminal action of a chain.
 *
 * @example
 * ```typescript
 * const books = endpoint({ path: "/books", description: "List books" })
 * // → Leaf for GET /books
 * ```
 */
export const endpoint = (info: {
	readonly method?: HttpMethod;
	readonly path: string;
	readonly description?: string;
}): Leaf<[]> => ({
	_tag: "Leaf",
	endpoint: {
		method: info.method ?? "GET",
		path: info.path,
		...(info.description !== undefined ? { description: info.description } : {}),
	},
	invoke: (handler) => handler(),
});

/**
 * Find the endpoint a chain ends in.
 */
export const endpointOf = (route: RouteShape): EndpointInfo =>
	route._tag === "Leaf" ? route.endpoint : endpointOf(route.next);

/**
 * List the combinators of a chain in order.
 */
export const combinatorsOf = (route: RouteShape): ReadonlyArray<CombinatorInfo> =>
	route._tag === "Leaf" ? [] : [route.combinator, ...combinatorsOf(route.next)];
