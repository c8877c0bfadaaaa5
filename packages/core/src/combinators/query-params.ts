/**
 * Multi-value combinator: zero or more occurrences of one parameter.
 *
 * The key `name` and the array-style key `name[]` are read interchangeably
 * and may be mixed. Value-less occurrences and values that fail to decode
 * are dropped; the rest keep their original order.
 *
 * @module
 */

import { Option } from "effect";
import type { Conversion } from "../conversion/conversion.js";
import { InvalidParamNameError } from "../errors/param-errors.js";
import { registerParam } from "../docs/docs-record.js";
import { appendParam } from "../query-string/outgoing-request.js";
import { lookupAll } from "../query-string/parse.js";
import type { ParamOptions, QueryCombinator } from "../route/route-descriptor.js";
import { assertParamName } from "./param-name.js";

export const QUERY_PARAMS = "QueryParams";

export const queryParams = <T>(
	name: string,
	conversion: Conversion<T>,
	options: ParamOptions = {},
): QueryCombinator<ReadonlyArray<T>> => {
	assertParamName(QUERY_PARAMS, name);
	if (name.endsWith("[]")) {
		throw new InvalidParamNameError({
			name,
			kind: QUERY_PARAMS,
			message: `${QUERY_PARAMS} name '${name}' must be given without the trailing '[]'`,
		});
	}

	return {
		kind: QUERY_PARAMS,
		name,

		serve: (query, k) =>
			k(
				lookupAll(query, name).flatMap((entry) =>
					Option.match(Option.flatMap(entry, conversion.decode), {
						onNone: (): ReadonlyArray<T> => [],
						onSome: (decoded) => [decoded],
					}),
				),
			),

		encode: (request, values, k) =>
			k(
				values.reduce(
					(acc, value) => appendParam(acc, name, Option.some(conversion.encode(value))),
					request,
				),
			),

		document: (docs, k) =>
			k(
				registerParam(docs, {
					name,
					kind: QUERY_PARAMS,
					valueType: conversion.name,
					...(options.description !== undefined ? { description: options.description } : {}),
					values: options.values ?? [],
				}),
			),
	};
};
