/**
 * Text conversions used by the combinators to turn query values into typed
 * values and back.
 *
 * `decode` may fail and reports failure as `None` with no further detail;
 * `encode` must be total.
 *
 * @module
 */

import { Option, Schema } from "effect";

export interface Conversion<T> {
	/** Short type name shown in generated docs (e.g. "integer") */
	readonly name: string;
	readonly decode: (text: string) => Option.Option<T>;
	readonly encode: (value: T) => string;
}

// ============================================================================
// Built-in Conversions
// ============================================================================

export const text: Conversion<string> = {
	name: "text",
	decode: (value) => Option.some(value),
	encode: (value) => value,
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Base-10 integers within the safe integer range.
 * Blank, fractional and exponent forms are rejected.
 */
export const integer: Conversion<number> = {
	name: "integer",
	decode: (value) => {
		if (!INTEGER_PATTERN.test(value)) return Option.none();
		const parsed = Number.parseInt(value, 10);
		return Number.isSafeInteger(parsed) ? Option.some(parsed) : Option.none();
	},
	encode: (value) => String(value),
};

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Finite decimal numbers. `NaN`, `Infinity`, hex literals and blanks are
 * rejected.
 */
export const number: Conversion<number> = {
	name: "number",
	decode: (value) => {
		if (!DECIMAL_PATTERN.test(value)) return Option.none();
		const parsed = Number(value);
		return Number.isFinite(parsed) ? Option.some(parsed) : Option.none();
	},
	encode: (value) => String(value),
};

export const boolean: Conversion<boolean> = {
	name: "boolean",
	decode: (value) => {
		if (value === "true") return Option.some(true);
		if (value === "false") return Option.some(false);
		return Option.none();
	},
	encode: (value) => (value ? "true" : "false"),
};

/**
 * One of a fixed set of strings, matched case-sensitively.
 *
 * @example
 * ```typescript
 * const order = literal("asc", "desc")
 * order.decode("desc") // → Some("desc")
 * order.decode("DESC") // → None
 * ```
 */
export const literal = <const Values extends ReadonlyArray<string>>(
	...values: Values
): Conversion<Values[number]> => {
	const matches = (value: string): value is Values[number] =>
		values.includes(value);
	return {
		name: values.join(" | "),
		decode: (value) => (matches(value) ? Option.some(value) : Option.none()),
		encode: (value) => value,
	};
};

/**
 * Build a conversion from any schema whose encoded side is a string.
 * Decoding failures become `None`.
 *
 * @example
 * ```typescript
 * const isbn = fromSchema("isbn", Schema.String.pipe(Schema.pattern(/^\d{13}$/)))
 * ```
 */
export const fromSchema = <A>(
	name: string,
	schema: Schema.Schema<A, string>,
): Conversion<A> => {
	const decode = Schema.decodeUnknownOption(schema);
	const encode = Schema.encodeSync(schema);
	return {
		name,
		decode: (value) => decode(value),
		encode: (value) => encode(value),
	};
};
