import { InvalidParamNameError } from "../errors/param-errors.js";

const RESERVED_CHARACTERS = /[&=#]/;

/**
 * Reject names that could never be matched in a query string.
 * Throws {@link InvalidParamNameError}.
 */
export const assertParamName = (kind: string, name: string): void => {
	if (name.length === 0) {
		throw new InvalidParamNameError({
			name,
			kind,
			message: `${kind} name must not be empty`,
		});
	}
	if (RESERVED_CHARACTERS.test(name)) {
		throw new InvalidParamNameError({
			name,
			kind,
			message: `${kind} name '${name}' must not contain '&', '=' or '#'`,
		});
	}
};
