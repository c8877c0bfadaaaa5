import { docsFor, type DocsRecord } from "@querykit/core";
import type { RestEndpoint } from "./handlers.js";

/**
 * Produce one docs record per bound endpoint, in the given order.
 */
export const describeApi = (endpoints: ReadonlyArray<RestEndpoint>): ReadonlyArray<DocsRecord> =>
	endpoints.map((bound) => docsFor(bound.route));
