import type { Environment } from "./env";

export interface Callable {
	readonly name: string;
	invoke(env: Environment, args: SExprValue): Value;
}

export type ErrorKind =
	| "InvalidNumber"
	| "UnboundSymbol"
	| "TypeMismatch"
	| "ArityMismatch"
	| "DivisionByZero"
	| "EmptyListAccess"
	| "NotAFunction"
	| "UnknownFunction";

export type ErrorDetail = {
	fn?: string;
	index?: number;
	expected?: string | number;
	got?: string | number;
	symbol?: string;
	reason?: string;
};

export type NumberValue = { type: "Number"; num: bigint };
export type ErrorValue = { type: "Error"; kind: ErrorKind; detail: ErrorDetail };
export type SymbolValue = { type: "Symbol"; name: string };
export type FunctionValue = { type: "Function"; fn: Callable };
export type SExprValue = { type: "SExpr"; cells: Value[] };
export type QExprValue = { type: "QExpr"; cells: Value[] };

export type Value =
	| NumberValue
	| ErrorValue
	| SymbolValue
	| FunctionValue
	| SExprValue
	| QExprValue;

export type ValueType = Value["type"];
export type ListValue = SExprValue | QExprValue;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export function num(n: bigint): NumberValue {
	return { type: "Number", num: BigInt.asIntN(64, n) };
}

export function err(kind: ErrorKind, detail: ErrorDetail = {}): ErrorValue {
	return { type: "Error", kind, detail };
}

export function sym(name: string): SymbolValue {
	return { type: "Symbol", name };
}

export function fun(fn: Callable): FunctionValue {
	return { type: "Function", fn };
}

export function sexpr(cells: Value[] = []): SExprValue {
	return { type: "SExpr", cells };
}

export function qexpr(cells: Value[] = []): QExprValue {
	return { type: "QExpr", cells };
}

export function isList(v: Value): v is ListValue {
	return v.type === "SExpr" || v.type === "QExpr";
}

export function typeName(type: ValueType): string {
	switch (type) {
		case "Number": return "Number";
		case "Error": return "Error";
		case "Symbol": return "Symbol";
		case "Function": return "Function";
		case "SExpr": return "S-Expression";
		case "QExpr": return "Q-Expression";
	}
}

/** Deep clone. Callables are stateless, so function copies share them. */
export function copyValue(v: Value): Value {
	switch (v.type) {
		case "Number": return { type: "Number", num: v.num };
		case "Error": return { type: "Error", kind: v.kind, detail: { ...v.detail } };
		case "Symbol": return { type: "Symbol", name: v.name };
		case "Function": return { type: "Function", fn: v.fn };
		case "SExpr": return { type: "SExpr", cells: v.cells.map(copyValue) };
		case "QExpr": return { type: "QExpr", cells: v.cells.map(copyValue) };
	}
}

/**
 * Give up a value. Lists are emptied so a released container can no longer
 * hand out the cells it held; leaves carry nothing to give back.
 */
export function release(v: Value): void {
	if (isList(v)) v.cells.length = 0;
}

export function pop(list: ListValue, i: number): Value {
	const [x] = list.cells.splice(i, 1);
	return x;
}

export function take(list: ListValue, i: number): Value {
	const x = pop(list, i);
	release(list);
	return x;
}

export function errorMessage(e: ErrorValue): string {
	const { fn = "?", index = 0, expected = "?", got = "?", symbol = "", reason } = e.detail;
	switch (e.kind) {
		case "InvalidNumber": return "Invalid number";
		case "UnboundSymbol": return `unbound symbol '${symbol}'!`;
		case "DivisionByZero": return "Division by zero!";
		case "NotAFunction": return "First element is not a function";
		case "UnknownFunction": return `Unknown Function '${fn}'!`;
		case "EmptyListAccess": return `Function '${fn}' passed {}!`;
		case "ArityMismatch": {
			const what = reason ?? "passed incorrect number of arguments";
			return `Function '${fn}' ${what}. Got ${got}, Expected ${expected}!`;
		}
		case "TypeMismatch": {
			const msg = `Function '${fn}' passed incorrect type for argument ${index}! Got ${got}, Expected ${expected}.`;
			return reason ? `${reason} ${msg}` : msg;
		}
	}
}
