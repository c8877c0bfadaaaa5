/**
 * Query string parsing and per-key lookup.
 *
 * A parsed query is an ordered list of entries. Duplicate keys are legal
 * and kept in their original position; a key written without `=` is stored
 * with no value, a key written as `key=` is stored with the empty string.
 *
 * @module
 */

import { Option } from "effect";

// ============================================================================
// Types
// ============================================================================

/**
 * One `key` or `key=value` token of a query string.
 * `value` is `None` when the token had no `=`.
 */
export interface QueryEntry {
	readonly key: string;
	readonly value: Option.Option<string>;
}

/**
 * Ordered multi-map produced by {@link parseQuery}.
 */
export type ParsedQuery = ReadonlyArray<QueryEntry>;

/**
 * Result of looking a single key up in a parsed query.
 */
export type Lookup =
	| { readonly _tag: "Absent" }
	| { readonly _tag: "PresentNoValue" }
	| { readonly _tag: "PresentWithValue"; readonly value: string };

const absent: Lookup = { _tag: "Absent" };
const presentNoValue: Lookup = { _tag: "PresentNoValue" };

// ============================================================================
// Parsing
// ============================================================================

/**
 * Split a query string into entries without decoding anything.
 *
 * Keys and values are expected to be percent-decoded already. A single
 * leading `?` is dropped and empty tokens are skipped, so `""`, `"?"` and
 * `"a&&b&"` contain zero, zero and two entries.
 *
 * @example
 * ```typescript
 * parseQuery("author=Le%20Guin&published&year=")
 * // → [
 * //     { key: "author", value: Some("Le%20Guin") },
 * //     { key: "published", value: None },
 * //     { key: "year", value: Some("") },
 * //   ]
 * ```
 */
export const parseQuery = (raw: string): ParsedQuery =>
	tokenize(raw).map(splitToken);

/**
 * Like {@link parseQuery}, but form-decodes every key and value after
 * splitting: `+` becomes a space, then `%XX` escapes are decoded. A
 * component holding a malformed escape is kept as written.
 */
export const parseEncodedQuery = (raw: string): ParsedQuery =>
	tokenize(raw)
		.map(splitToken)
		.map((entry) => ({
			key: decodeComponent(entry.key),
			value: Option.map(entry.value, decodeComponent),
		}));

const tokenize = (raw: string): ReadonlyArray<string> => {
	const body = raw.startsWith("?") ? raw.slice(1) : raw;
	return body.split("&").filter((token) => token.length > 0);
};

const splitToken = (token: string): QueryEntry => {
	const eq = token.indexOf("=");
	if (eq === -1) {
		return { key: token, value: Option.none() };
	}
	return { key: token.slice(0, eq), value: Option.some(token.slice(eq + 1)) };
};

const decodeComponent = (component: string): string => {
	const spaced = component.replace(/\+/g, " ");
	try {
		return decodeURIComponent(spaced);
	} catch (error) {
		if (error instanceof URIError) {
			return component;
		}
		throw error;
	}
};

// ============================================================================
// Lookup
// ============================================================================

/**
 * Find the first entry keyed exactly `name`.
 * Later duplicates are ignored.
 */
export const lookupSingle = (query: ParsedQuery, name: string): Lookup => {
	const entry = query.find((candidate) => candidate.key === name);
	if (entry === undefined) {
		return absent;
	}
	return Option.match(entry.value, {
		onNone: () => presentNoValue,
		onSome: (value): Lookup => ({ _tag: "PresentWithValue", value }),
	});
};

/**
 * Collect the values of every entry keyed `name` or `name[]`, in the order
 * they occur. Both spellings may be mixed in one query.
 */
export const lookupAll = (
	query: ParsedQuery,
	name: string,
): ReadonlyArray<Option.Option<string>> => {
	const arrayKey = `${name}[]`;
	return query
		.filter((entry) => entry.key === name || entry.key === arrayKey)
		.map((entry) => entry.value);
};
