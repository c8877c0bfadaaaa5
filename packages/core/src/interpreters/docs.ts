/**
 * Docs interpreter: collects one entry per combinator plus the endpoint
 * metadata of the leaf.
 *
 * @module
 */

import { emptyDocs, withEndpoint, type DocsRecord } from "../docs/docs-record.js";
import type { RouteShape } from "../route/route-descriptor.js";

export const docsFor = (route: RouteShape, docs: DocsRecord = emptyDocs): DocsRecord => {
	if (route._tag === "Leaf") {
		return withEndpoint(docs, route.endpoint);
	}
	const { combinator, next } = route;
	return combinator.document(docs, (documented) => docsFor(next, documented));
};
