/**
 * Tests for REST error mapping — verifies each tagged error maps to the
 * correct HTTP status, and unknown errors map to 500.
 */

import { Data, Effect } from "effect";
import { describe, expect, it } from "vitest";
import { InvalidParamNameError } from "@querykit/core";
import { mapErrorToResponse } from "../src/error-mapping.js";
import {
	DuplicateRouteError,
	HandlerError,
	MethodNotAllowedError,
	RouteNotFoundError,
} from "../src/errors.js";

class QuotaExceededError extends Data.TaggedError("QuotaExceededError")<{
	readonly limit: number;
}> {}

describe("Error mapping — REST errors", () => {
	it("should map RouteNotFoundError to 404", () => {
		const response = mapErrorToResponse(
			new RouteNotFoundError({ path: "/nope", message: "No route for /nope" }),
		);

		expect(response).toEqual({
			status: 404,
			body: {
				_tag: "RouteNotFoundError",
				error: "Route not found",
				details: { path: "/nope", message: "No route for /nope" },
			},
		});
	});

	it("should map MethodNotAllowedError to 405", () => {
		const response = mapErrorToResponse(
			new MethodNotAllowedError({
				method: "PUT",
				path: "/books",
				allowed: ["GET"],
				message: "PUT is not allowed on /books",
			}),
		);

		expect(response.status).toBe(405);
		expect(response.body.error).toBe("Method not allowed");
	});

	it("should map HandlerError, DuplicateRouteError and InvalidParamNameError to 500", () => {
		const errors = [
			new HandlerError({ method: "GET", path: "/books", message: "boom" }),
			new DuplicateRouteError({ method: "GET", path: "/books", message: "twice" }),
			new InvalidParamNameError({ name: "", kind: "QueryFlag", message: "empty" }),
		];

		expect(errors.map((error) => mapErrorToResponse(error).status)).toEqual([500, 500, 500]);
		expect(errors.map((error) => mapErrorToResponse(error).body.error)).toEqual([
			"Handler error",
			"Duplicate route",
			"Invalid parameter name",
		]);
	});
});

describe("Error mapping — FiberFailure", () => {
	it("should unwrap the tagged error from a rejected runPromise", async () => {
		const failure: unknown = await Effect.runPromise(
			Effect.fail(new RouteNotFoundError({ path: "/gone", message: "No route for /gone" })),
		).catch((error: unknown) => error);

		const response = mapErrorToResponse(failure);

		expect(response.status).toBe(404);
		expect(response.body._tag).toBe("RouteNotFoundError");
	});
});

describe("Error mapping — application errors", () => {
	it("should use the override table for unknown tags", () => {
		const response = mapErrorToResponse(new QuotaExceededError({ limit: 10 }), {
			QuotaExceededError: 422,
		});

		expect(response).toEqual({
			status: 422,
			body: {
				_tag: "QuotaExceededError",
				error: "Unprocessable entity",
				details: { limit: 10 },
			},
		});
	});

	it("should default unknown tags to 500", () => {
		expect(mapErrorToResponse({ _tag: "Mystery" })).toEqual({
			status: 500,
			body: { _tag: "Mystery", error: "Internal server error" },
		});
	});
});

describe("Error mapping — untagged errors", () => {
	it("should map a plain Error to 500 UnknownError", () => {
		expect(mapErrorToResponse(new TypeError("bad"))).toEqual({
			status: 500,
			body: {
				_tag: "UnknownError",
				error: "Internal server error",
				details: { message: "bad", name: "TypeError" },
			},
		});
	});

	it("should map a non-error value to 500 without details", () => {
		expect(mapErrorToResponse("oops")).toEqual({
			status: 500,
			body: { _tag: "UnknownError", error: "Internal server error" },
		});
	});
});
