/**
 * Tests for combinators/query-flag.ts — the presence-flag combinator.
 */

import { Option } from "effect";
import { describe, expect, it } from "vitest";
import { queryFlag } from "../src/combinators/query-flag.js";
import { emptyDocs } from "../src/docs/docs-record.js";
import { appendParam, makeRequest, renderQuery } from "../src/query-string/outgoing-request.js";
import { parseQuery } from "../src/query-string/parse.js";

const flag = queryFlag("f");

const serveFlag = (raw: string): boolean => flag.serve(parseQuery(raw), (value) => value);

// ============================================================================
// Server
// ============================================================================

describe("queryFlag — server", () => {
	it.each(["f", "f=true", "f=1", "f="])("should read %s as true", (raw) => {
		expect(serveFlag(raw)).toBe(true);
	});

	it.each(["f=false", "f=0", "f=no", "f=TRUE", "f=yes"])("should read %s as false", (raw) => {
		expect(serveFlag(raw)).toBe(false);
	});

	it("should read a missing key as false", () => {
		expect(serveFlag("g")).toBe(false);
		expect(serveFlag("")).toBe(false);
	});

	it("should only consider the first occurrence", () => {
		expect(serveFlag("f=0&f")).toBe(false);
		expect(serveFlag("f&f=0")).toBe(true);
	});
});

// ============================================================================
// Client
// ============================================================================

describe("queryFlag — client", () => {
	const base = appendParam(makeRequest("GET", "/books"), "q", Option.some("x"));

	it("should leave the request unchanged for false", () => {
		const result = flag.encode(base, false, (request) => request);

		expect(result).toBe(base);
		expect(renderQuery(result.query)).toBe("q=x");
	});

	it("should append a bare key for true", () => {
		const result = flag.encode(base, true, (request) => request);

		expect(renderQuery(result.query)).toBe("q=x&f");
	});
});

// ============================================================================
// Docs
// ============================================================================

describe("queryFlag — docs", () => {
	it("should register a QueryFlag entry without a value type", () => {
		const published = queryFlag("published", { description: "Only published books" });

		expect(published.document(emptyDocs, (docs) => docs).params).toEqual([
			{
				name: "published",
				kind: "QueryFlag",
				description: "Only published books",
				values: [],
			},
		]);
	});
});
