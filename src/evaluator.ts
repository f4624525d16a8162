import type { Environment } from "./env";
import { err, pop, release, SExprValue, take, Value } from "./value";

/**
 * Reduces a value. Takes ownership of `value` and returns a new value owned
 * by the caller. Recursion follows the nesting of the input, so deeply nested
 * expressions are bounded by the host stack.
 */
export function evaluate(env: Environment, value: Value): Value {
	switch (value.type) {
		case "Symbol": return env.lookup(value.name);
		case "SExpr": return reduce(env, value);
		case "QExpr":
		case "Number":
		case "Error":
		case "Function":
			return value;
	}
}

export function reduce(env: Environment, v: SExprValue): Value {
	for (let i = 0; i < v.cells.length; i++) {
		v.cells[i] = evaluate(env, v.cells[i]);
	}

	const failed = v.cells.findIndex(c => c.type === "Error");
	if (failed !== -1) return take(v, failed);

	if (v.cells.length === 0) return v;
	if (v.cells.length === 1) return take(v, 0);

	const f = pop(v, 0);
	if (f.type !== "Function") {
		release(f);
		release(v);
		return err("NotAFunction");
	}

	// v is now the argument bundle, handed to the callable
	return f.fn.invoke(env, v);
}
