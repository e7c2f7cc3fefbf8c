/**
 * Field coercion: raw field text → typed {@link Value}.
 *
 * Coercion is total. Anything that is not a quoted string, a boolean
 * literal or a number comes back as the raw text, so callers never see
 * an error from this module.
 */

import type { Scalar, Value } from "./types.js";

const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function frozen(value: Value): Value {
	Object.freeze(value);
	return value;
}

/**
 * Coerce a single raw field.
 *
 * Rules, first match wins:
 * 1. `"text"` (length > 1) → String `text`, one quote stripped from each end.
 * 2. `True` / `False` → Boolean.
 * 3. Numeric: Float when the text contains `.`, Integer otherwise.
 *    Surrounding whitespace is ignored for this step only. Integers outside
 *    the safe range and floats that overflow to infinity skip this rule so
 *    their digits are kept.
 * 4. Anything else → String with the raw text, whitespace included.
 */
export function coerce(field: string): Value {
	if (field.length > 1 && field.startsWith('"') && field.endsWith('"')) {
		return frozen({ kind: "string", value: field.slice(1, -1) });
	}

	if (field === "True") return frozen({ kind: "boolean", value: true });
	if (field === "False") return frozen({ kind: "boolean", value: false });

	const numeric = field.trim();
	if (numeric.includes(".")) {
		if (FLOAT_RE.test(numeric)) {
			const parsed = Number(numeric);
			if (Number.isFinite(parsed)) return frozen({ kind: "float", value: parsed });
		}
	} else if (INTEGER_RE.test(numeric)) {
		const parsed = Number.parseInt(numeric, 10);
		// `+ 0` turns -0 into 0
		if (Number.isSafeInteger(parsed)) return frozen({ kind: "integer", value: parsed + 0 });
	}

	return frozen({ kind: "string", value: field });
}

/** Strip the kind tag from a value. */
export function unwrap(value: Value): Scalar {
	return value.value;
}
