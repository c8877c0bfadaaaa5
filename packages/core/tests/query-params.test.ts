/**
 * Tests for combinators/query-params.ts — the multi-value combinator.
 */

import { Option } from "effect";
import { describe, expect, it } from "vitest";
import { integer, text } from "../src/conversion/conversion.js";
import { queryParams } from "../src/combinators/query-params.js";
import { emptyDocs } from "../src/docs/docs-record.js";
import { InvalidParamNameError } from "../src/errors/param-errors.js";
import { appendParam, makeRequest, renderQuery } from "../src/query-string/outgoing-request.js";
import { parseQuery } from "../src/query-string/parse.js";

const ids = queryParams("a", integer);

const serveIds = (raw: string): ReadonlyArray<number> =>
	ids.serve(parseQuery(raw), (values) => values);

// ============================================================================
// Server
// ============================================================================

describe("queryParams — server", () => {
	it("should keep occurrence order across plain and array-style keys", () => {
		expect(serveIds("a=1&a=2&a[]=3")).toEqual([1, 2, 3]);
	});

	it("should drop values that fail to decode without reordering the rest", () => {
		expect(serveIds("a=1&a=xyz&a=3")).toEqual([1, 3]);
	});

	it("should drop value-less occurrences", () => {
		expect(serveIds("a&a[]&a=4")).toEqual([4]);
	});

	it("should yield an empty list when the key is absent", () => {
		expect(serveIds("b=1")).toEqual([]);
		expect(serveIds("")).toEqual([]);
	});

	it("should keep empty strings for conversions that accept them", () => {
		const tags = queryParams("tag", text);

		expect(tags.serve(parseQuery("tag=&tag[]=sf"), (values) => values)).toEqual(["", "sf"]);
	});
});

// ============================================================================
// Client
// ============================================================================

describe("queryParams — client", () => {
	const base = appendParam(makeRequest("GET", "/books"), "limit", Option.some("5"));

	it("should leave the request unchanged for an empty list", () => {
		const result = ids.encode(base, [], (request) => request);

		expect(result).toBe(base);
		expect(renderQuery(result.query)).toBe("limit=5");
	});

	it("should append one occurrence per element, in order", () => {
		const result = ids.encode(base, [3, 1, 2], (request) => request);

		expect(renderQuery(result.query)).toBe("limit=5&a=3&a=1&a=2");
	});
});

// ============================================================================
// Docs
// ============================================================================

describe("queryParams — docs", () => {
	it("should register a QueryParams entry", () => {
		const docs = ids.document(emptyDocs, (result) => result);

		expect(docs.params).toEqual([
			{ name: "a", kind: "QueryParams", valueType: "integer", values: [] },
		]);
	});
});

describe("queryParams — names", () => {
	it("should reject names that already carry the array suffix", () => {
		expect(() => queryParams("tags[]", text)).toThrow(InvalidParamNameError);
	});
});
