/**
 * Presence-flag combinator: a boolean read from a key's presence.
 *
 * A bare key is true. A key with a value is true only when the value is
 * exactly "true", "1" or the empty string. A missing key is false. On the
 * client, `true` appends the bare key and `false` appends nothing.
 *
 * @module
 */

import { Option } from "effect";
import { registerParam } from "../docs/docs-record.js";
import { appendParam } from "../query-string/outgoing-request.js";
import { lookupSingle } from "../query-string/parse.js";
import type { ParamOptions, QueryCombinator } from "../route/route-descriptor.js";
import { assertParamName } from "./param-name.js";

export const QUERY_FLAG = "QueryFlag";

const TRUTHY_VALUES: ReadonlySet<string> = new Set(["true", "1", ""]);

export const queryFlag = (name: string, options: ParamOptions = {}): QueryCombinator<boolean> => {
	assertParamName(QUERY_FLAG, name);

	return {
		kind: QUERY_FLAG,
		name,

		serve: (query, k) => {
			const found = lookupSingle(query, name);
			switch (found._tag) {
				case "Absent":
					return k(false);
				case "PresentNoValue":
					return k(true);
				case "PresentWithValue":
					return k(TRUTHY_VALUES.has(found.value));
			}
		},

		encode: (request, flag, k) =>
			k(flag ? appendParam(request, name, Option.none()) : request),

		document: (docs, k) =>
			k(
				registerParam(docs, {
					name,
					kind: QUERY_FLAG,
					...(options.description !== undefined ? { description: options.description } : {}),
					values: options.values ?? [],
				}),
			),
	};
};
