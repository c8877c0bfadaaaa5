/**
 * Tests for query-string/parse.ts — tokenising and key lookup.
 */

import { Option } from "effect";
import { describe, expect, it } from "vitest";
import {
	lookupAll,
	lookupSingle,
	parseEncodedQuery,
	parseQuery,
	type ParsedQuery,
} from "../src/query-string/parse.js";

/**
 * Flatten entries to `[key, value | null]` pairs for readable assertions.
 */
const pairs = (query: ParsedQuery) =>
	query.map((entry) => [entry.key, Option.getOrNull(entry.value)]);

// ============================================================================
// parseQuery
// ============================================================================

describe("parseQuery", () => {
	it("should store a bare key without a value", () => {
		expect(pairs(parseQuery("a"))).toEqual([["a", null]]);
	});

	it("should store an empty value for a trailing '='", () => {
		expect(pairs(parseQuery("a="))).toEqual([["a", ""]]);
	});

	it("should split each token on the first '=' only", () => {
		expect(pairs(parseQuery("expr=x=y"))).toEqual([["expr", "x=y"]]);
	});

	it("should keep duplicates in their original order", () => {
		expect(pairs(parseQuery("a=1&b&a=2"))).toEqual([
			["a", "1"],
			["b", null],
			["a", "2"],
		]);
	});

	it("should drop a leading '?' and skip empty tokens", () => {
		expect(pairs(parseQuery("?a&&b=&"))).toEqual([
			["a", null],
			["b", ""],
		]);
	});

	it("should return no entries for an empty query", () => {
		expect(parseQuery("")).toEqual([]);
		expect(parseQuery("?")).toEqual([]);
	});

	it("should not decode escapes", () => {
		expect(pairs(parseQuery("q=a%20b+c"))).toEqual([["q", "a%20b+c"]]);
	});
});

// ============================================================================
// parseEncodedQuery
// ============================================================================

describe("parseEncodedQuery", () => {
	it("should decode '+' and percent escapes in keys and values", () => {
		expect(pairs(parseEncodedQuery("tags%5B%5D=sci+fi&title=Dune%3A%20Messiah"))).toEqual([
			["tags[]", "sci fi"],
			["title", "Dune: Messiah"],
		]);
	});

	it("should keep '&' and '=' that were escaped inside a value", () => {
		expect(pairs(parseEncodedQuery("q=a%26b%3Dc"))).toEqual([["q", "a&b=c"]]);
	});

	it("should keep a component with a malformed escape as written", () => {
		expect(pairs(parseEncodedQuery("q=100%&r=%E0%A4%A"))).toEqual([
			["q", "100%"],
			["r", "%E0%A4%A"],
		]);
	});

	it("should not turn '+' into a space in a component it keeps as written", () => {
		expect(pairs(parseEncodedQuery("q=a+b%"))).toEqual([["q", "a+b%"]]);
	});

	it("should leave bare keys without a value", () => {
		expect(pairs(parseEncodedQuery("published"))).toEqual([["published", null]]);
	});
});

// ============================================================================
// lookupSingle
// ============================================================================

describe("lookupSingle", () => {
	it("should report a bare key as present without a value", () => {
		expect(lookupSingle(parseQuery("a"), "a")).toEqual({ _tag: "PresentNoValue" });
	});

	it("should report 'a=' as present with the empty string", () => {
		expect(lookupSingle(parseQuery("a="), "a")).toEqual({
			_tag: "PresentWithValue",
			value: "",
		});
	});

	it("should report 'a=x' as present with 'x'", () => {
		expect(lookupSingle(parseQuery("a=x"), "a")).toEqual({
			_tag: "PresentWithValue",
			value: "x",
		});
	});

	it("should report a missing key as absent", () => {
		expect(lookupSingle(parseQuery("b=1&ab=2&a[]=3"), "a")).toEqual({ _tag: "Absent" });
	});

	it("should use the first occurrence when a key repeats", () => {
		expect(lookupSingle(parseQuery("a&a=2"), "a")).toEqual({ _tag: "PresentNoValue" });
		expect(lookupSingle(parseQuery("a=1&a"), "a")).toEqual({
			_tag: "PresentWithValue",
			value: "1",
		});
	});
});

// ============================================================================
// lookupAll
// ============================================================================

describe("lookupAll", () => {
	it("should collect plain and array-style keys in occurrence order", () => {
		const values = lookupAll(parseQuery("a[]=1&b=9&a=2&a&a[]=3"), "a");

		expect(values.map(Option.getOrNull)).toEqual(["1", "2", null, "3"]);
	});

	it("should not match other keys sharing the prefix", () => {
		expect(lookupAll(parseQuery("ab=1&a[0]=2&a[][]=3"), "a")).toEqual([]);
	});
});
