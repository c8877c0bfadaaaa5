/**
 * Outgoing request values built by the client interpreter.
 *
 * @module
 */

import { Option } from "effect";
import type { QueryEntry } from "./parse.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE" | "PATCH";

/**
 * An immutable request under construction. Query entries are kept unescaped
 * and escaped only when rendered.
 */
export interface OutgoingRequest {
	readonly method: HttpMethod;
	readonly path: string;
	readonly query: ReadonlyArray<QueryEntry>;
}

export const makeRequest = (method: HttpMethod, path: string): OutgoingRequest => ({
	method,
	path,
	query: [],
});

/**
 * Return a copy of `request` with one more query entry: a bare key when
 * `value` is `None`, `name=value` otherwise.
 */
export const appendParam = (
	request: OutgoingRequest,
	name: string,
	value: Option.Option<string>,
): OutgoingRequest => ({
	...request,
	query: [...request.query, { key: name, value }],
});

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

// encodeURIComponent throws on unpaired surrogates
const escapeComponent = (component: string): string =>
	encodeURIComponent(component.replace(LONE_SURROGATE, "\uFFFD"));

/**
 * Serialise entries as a query string (no leading `?`).
 * Keys and values are escaped with `encodeURIComponent`; an unpaired
 * surrogate is written as U+FFFD.
 *
 * @example
 * ```typescript
 * renderQuery([
 *   { key: "tags[]", value: Option.some("sci fi") },
 *   { key: "published", value: Option.none() },
 * ])
 * // → "tags%5B%5D=sci%20fi&published"
 * ```
 */
export const renderQuery = (entries: ReadonlyArray<QueryEntry>): string =>
	entries
		.map((entry) =>
			Option.match(entry.value, {
				onNone: () => escapeComponent(entry.key),
				onSome: (value) => `${escapeComponent(entry.key)}=${escapeComponent(value)}`,
			}),
		)
		.join("&");

/**
 * Render `path?query`, optionally prefixed by `baseUrl`.
 * The `?` is omitted when there are no entries.
 */
export const toUrl = (request: OutgoingRequest, baseUrl = ""): string => {
	const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
	const query = renderQuery(request.query);
	return query.length > 0
		? `${base}${request.path}?${query}`
		: `${base}${request.path}`;
};
