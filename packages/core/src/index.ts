/**
 * Main entry point for @querykit/core.
 *
 * Describe an endpoint's query parameters once as a chain of combinators,
 * then derive a server-side decoder, a client-side encoder and parameter
 * documentation from that one description.
 */

// ============================================================================
// Query String Codec
// ============================================================================

export {
	parseQuery,
	parseEncodedQuery,
	lookupSingle,
	lookupAll,
} from "./query-string/parse.js";

export type { QueryEntry, ParsedQuery, Lookup } from "./query-string/parse.js";

export {
	makeRequest,
	appendParam,
	renderQuery,
	toUrl,
} from "./query-string/outgoing-request.js";

export type { HttpMethod, OutgoingRequest } from "./query-string/outgoing-request.js";

// ============================================================================
// Conversions
// ============================================================================

export {
	text,
	integer,
	number,
	boolean,
	literal,
	fromSchema,
} from "./conversion/conversion.js";

export type { Conversion } from "./conversion/conversion.js";

// ============================================================================
// Route Descriptors
// ============================================================================

export { endpoint, endpointOf, combinatorsOf } from "./route/route-descriptor.js";
export { param } from "./route/param.js";

export type {
	ServerInterpretable,
	ClientInterpretable,
	DocsInterpretable,
	CombinatorInfo,
	QueryCombinator,
	ParamOptions,
	EndpointInfo,
	RouteShape,
	Leaf,
	Node,
	RouteDescriptor,
	RouteArgs,
} from "./route/route-descriptor.js";

// ============================================================================
// Combinators
// ============================================================================

export { queryParam, QUERY_PARAM } from "./combinators/query-param.js";
export { queryParams, QUERY_PARAMS } from "./combinators/query-params.js";
export { queryFlag, QUERY_FLAG } from "./combinators/query-flag.js";
export { assertParamName } from "./combinators/param-name.js";

// ============================================================================
// Interpreters
// ============================================================================

export { serveQuery, serveRequest } from "./interpreters/server.js";
export type { IncomingRequest } from "./interpreters/server.js";
export { encodeRequest, client } from "./interpreters/client.js";
export { docsFor } from "./interpreters/docs.js";

// ============================================================================
// Docs Records
// ============================================================================

export { emptyDocs, registerParam, withEndpoint } from "./docs/docs-record.js";
export type { DocEntry, DocsRecord } from "./docs/docs-record.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export { InvalidParamNameError } from "./errors/param-errors.js";
