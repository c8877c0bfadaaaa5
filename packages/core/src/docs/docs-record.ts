/**
 * Documentation records accumulated by the docs interpreter.
 *
 * @module
 */

import { Option } from "effect";
import type { EndpointInfo } from "../route/route-descriptor.js";

/**
 * Describes one query parameter of an endpoint.
 */
export interface DocEntry {
	readonly name: string;
	/** Combinator kind that produced the entry (e.g. "QueryParam") */
	readonly kind: string;
	/** Name of the value conversion, absent for flags */
	readonly valueType?: string;
	readonly description?: string;
	/** Example values */
	readonly values: ReadonlyArray<string>;
}

export interface DocsRecord {
	readonly endpoint: Option.Option<EndpointInfo>;
	readonly params: ReadonlyArray<DocEntry>;
}

export const emptyDocs: DocsRecord = {
	endpoint: Option.none(),
	params: [],
};

export const registerParam = (docs: DocsRecord, entry: DocEntry): DocsRecord => ({
	...docs,
	params: [...docs.params, entry],
});

export const withEndpoint = (docs: DocsRecord, endpoint: EndpointInfo): DocsRecord => ({
	...docs,
	endpoint: Option.some(endpoint),
});
