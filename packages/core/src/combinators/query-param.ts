/**
 * Single-value combinator: one optional scalar query parameter.
 *
 * - Server: absent, value-less or undecodable → `None`; otherwise
 *   `Some(decoded)`. The first occurrence of the key wins.
 * - Client: `None` leaves the request untouched; `Some(v)` appends
 *   `name=encode(v)`.
 * - Docs: registers a "QueryParam" entry.
 *
 * @module
 */

import { Option } from "effect";
import type { Conversion } from "../conversion/conversion.js";
import { registerParam } from "../docs/docs-record.js";
import { appendParam } from "../query-string/outgoing-request.js";
import { lookupSingle } from "../query-string/parse.js";
import type { ParamOptions, QueryCombinator } from "../route/route-descriptor.js";
import { assertParamName } from "./param-name.js";

export const QUERY_PARAM = "QueryParam";

export const queryParam = <T>(
	name: string,
	conversion: Conversion<T>,
	options: ParamOptions = {},
): QueryCombinator<Option.Option<T>> => {
	assertParamName(QUERY_PARAM, name);

	return {
		kind: QUERY_PARAM,
		name,

		serve: (query, k) => {
			const found = lookupSingle(query, name);
			return k(
				found._tag === "PresentWithValue" ? conversion.decode(found.value) : Option.none(),
			);
		},

		encode: (request, value, k) =>
			k(
				Option.match(value, {
					onNone: () => request,
					onSome: (v) => appendParam(request, name, Option.some(conversion.encode(v))),
				}),
			),

		document: (docs, k) =>
			k(
				registerParam(docs, {
					name,
					kind: QUERY_PARAM,
					valueType: conversion.name,
					...(options.description !== undefined ? { description: options.description } : {}),
					values: options.values ?? [],
				}),
			),
	};
};
