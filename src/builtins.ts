import type { Environment } from "./env";
import { evaluate } from "./evaluator";
import {
	Callable,
	err,
	ErrorValue,
	fun,
	num,
	QExprValue,
	qexpr,
	release,
	sexpr,
	SExprValue,
	typeName,
	Value,
	ValueType,
} from "./value";

// Every builtin owns its argument bundle: on success it forwards or releases
// each cell, and on failure the check that failed releases the bundle.

function fail(args: SExprValue, e: ErrorValue): ErrorValue {
	release(args);
	return e;
}

function checkArity(fn: string, args: SExprValue, expected: number): ErrorValue | undefined {
	const got = args.cells.length;
	if (got === expected) return undefined;
	return fail(args, err("ArityMismatch", { fn, expected, got }));
}

function typeMismatch(fn: string, index: number, got: Value, expected: ValueType[], reason?: string): ErrorValue {
	return err("TypeMismatch", {
		fn,
		index,
		got: typeName(got.type),
		expected: expected.map(typeName).join(" or "),
		reason,
	});
}

function qexprArg(fn: string, args: SExprValue, index: number): QExprValue | ErrorValue {
	const v = args.cells[index];
	if (v.type === "QExpr") return v;
	return fail(args, typeMismatch(fn, index, v, ["QExpr"]));
}

function nonEmptyArg(fn: string, args: SExprValue): QExprValue | ErrorValue {
	const bad = checkArity(fn, args, 1);
	if (bad) return bad;
	const q = qexprArg(fn, args, 0);
	if (q.type === "Error") return q;
	if (q.cells.length === 0) return fail(args, err("EmptyListAccess", { fn }));
	return q;
}

export abstract class Builtin implements Callable {
	constructor(readonly name: string) {}

	abstract invoke(env: Environment, args: SExprValue): Value;
}

export class ListBuiltin extends Builtin {
	invoke(_env: Environment, args: SExprValue): Value {
		return { type: "QExpr", cells: args.cells };
	}
}

export class HeadBuiltin extends Builtin {
	invoke(_env: Environment, args: SExprValue): Value {
		const q = nonEmptyArg(this.name, args);
		if (q.type === "Error") return q;
		release(args);
		q.cells.splice(1);
		return q;
	}
}

export class TailBuiltin extends Builtin {
	invoke(_env: Environment, args: SExprValue): Value {
		const q = nonEmptyArg(this.name, args);
		if (q.type === "Error") return q;
		release(args);
		q.cells.shift();
		return q;
	}
}

export class InitBuiltin extends Builtin {
	invoke(_env: Environment, args: SExprValue): Value {
		const q = nonEmptyArg(this.name, args);
		if (q.type === "Error") return q;
		release(args);
		q.cells.pop();
		return q;
	}
}

export class EvalBuiltin extends Builtin {
	invoke(env: Environment, args: SExprValue): Value {
		const bad = checkArity(this.name, args, 1);
		if (bad) return bad;
		const q = qexprArg(this.name, args, 0);
		if (q.type === "Error") return q;
		release(args);
		return evaluate(env, sexpr(q.cells));
	}
}

export class JoinBuiltin extends Builtin {
	invoke(_env: Environment, args: SExprValue): Value {
		const lists: QExprValue[] = [];
		for (let i = 0; i < args.cells.length; i++) {
			const q = qexprArg(this.name, args, i);
			if (q.type === "Error") return q;
			lists.push(q);
		}
		release(args);

		const [first = qexpr(), ...rest] = lists;
		for (const q of rest) {
			first.cells.push(...q.cells);
			release(q);
		}
		return first;
	}
}

export class ConsBuiltin extends Builtin {
	invoke(_env: Environment, args: SExprValue): Value {
		const bad = checkArity(this.name, args, 2);
		if (bad) return bad;
		const head = args.cells[0];
		if (head.type !== "Number" && head.type !== "QExpr") {
			return fail(args, typeMismatch(this.name, 0, head, ["Number", "QExpr"]));
		}
		const tail = qexprArg(this.name, args, 1);
		if (tail.type === "Error") return tail;
		release(args);

		tail.cells.unshift(head);
		return tail;
	}
}

export class LenBuiltin extends Builtin {
	invoke(_env: Environment, args: SExprValue): Value {
		const bad = checkArity(this.name, args, 1);
		if (bad) return bad;
		const q = qexprArg(this.name, args, 0);
		if (q.type === "Error") return q;
		const count = q.cells.length;
		release(q);
		release(args);
		return num(BigInt(count));
	}
}

export class DefBuiltin extends Builtin {
	invoke(env: Environment, args: SExprValue): Value {
		if (args.cells.length === 0) {
			return fail(args, err("ArityMismatch", { fn: this.name, expected: "at least 1", got: 0 }));
		}
		const syms = qexprArg(this.name, args, 0);
		if (syms.type === "Error") return syms;

		const names: string[] = [];
		for (const s of syms.cells) {
			if (s.type !== "Symbol") {
				return fail(args, typeMismatch(this.name, 0, s, ["Symbol"], "Cannot define non-symbol!"));
			}
			names.push(s.name);
		}

		const values = args.cells.length - 1;
		if (names.length !== values) {
			return fail(args, err("ArityMismatch", {
				fn: this.name,
				expected: names.length,
				got: values,
				reason: "cannot define incorrect number of values to symbols",
			}));
		}

		names.forEach((name, i) => env.bind(name, args.cells[i + 1]));
		release(args);
		return sexpr();
	}
}

export type ArithOp = "+" | "-" | "*" | "/" | "%" | "exp" | "min" | "max";

function power(base: bigint, e: bigint): bigint | undefined {
	if (e < 0n) {
		if (base === 0n) return undefined;
		if (base === 1n) return 1n;
		if (base === -1n) return e % 2n === 0n ? 1n : -1n;
		return 0n;
	}
	let result = 1n;
	let b = base;
	let n = e;
	while (n > 0n) {
		if (n & 1n) result = BigInt.asIntN(64, result * b);
		b = BigInt.asIntN(64, b * b);
		n >>= 1n;
	}
	return result;
}

/** One fold step; `undefined` means division by zero. */
function applyOp(op: ArithOp, x: bigint, y: bigint): bigint | undefined {
	switch (op) {
		case "+": return x + y;
		case "-": return x - y;
		case "*": return x * y;
		case "/": return y === 0n ? undefined : x / y;
		case "%": return y === 0n ? undefined : x % y;
		case "exp": return power(x, y);
		case "min": return x < y ? x : y;
		case "max": return x > y ? x : y;
	}
}

export class ArithmeticBuiltin extends Builtin {
	constructor(name: string, readonly op: ArithOp) {
		super(name);
	}

	invoke(_env: Environment, args: SExprValue): Value {
		if (args.cells.length === 0) {
			return fail(args, err("ArityMismatch", { fn: this.name, expected: "at least 1", got: 0 }));
		}

		const operands: bigint[] = [];
		for (let i = 0; i < args.cells.length; i++) {
			const v = args.cells[i];
			if (v.type !== "Number") {
				return fail(args, typeMismatch(this.name, i, v, ["Number"], "Cannot operate on a non-number!"));
			}
			operands.push(v.num);
		}
		release(args);

		const [first, ...rest] = operands;
		if (this.op === "-" && rest.length === 0) return num(-first);

		let x = first;
		for (const y of rest) {
			const r = applyOp(this.op, x, y);
			if (r === undefined) return err("DivisionByZero");
			x = BigInt.asIntN(64, r);
		}
		return num(x);
	}
}

/** Name to implementation table, built once and installed into the global environment. */
export class BuiltinRegistry {
	private readonly table = new Map<string, Callable>();

	register(fn: Callable): this {
		this.table.set(fn.name, fn);
		return this;
	}

	get(name: string): Callable | undefined {
		return this.table.get(name);
	}

	names(): string[] {
		return [...this.table.keys()];
	}

	install(env: Environment): void {
		for (const [name, fn] of this.table) env.bind(name, fun(fn));
	}

	apply(name: string, env: Environment, args: SExprValue): Value {
		const fn = this.get(name);
		if (!fn) return fail(args, err("UnknownFunction", { fn: name }));
		return fn.invoke(env, args);
	}
}

const ARITHMETIC: [string, ArithOp][] = [
	["+", "+"], ["-", "-"], ["*", "*"], ["/", "/"], ["%", "%"],
	["add", "+"], ["sub", "-"], ["mul", "*"], ["div", "/"], ["mod", "%"],
	["exp", "exp"], ["min", "min"], ["max", "max"],
];

export function createBuiltinRegistry(): BuiltinRegistry {
	const registry = new BuiltinRegistry()
		.register(new ListBuiltin("list"))
		.register(new HeadBuiltin("head"))
		.register(new TailBuiltin("tail"))
		.register(new EvalBuiltin("eval"))
		.register(new JoinBuiltin("join"))
		.register(new ConsBuiltin("cons"))
		.register(new LenBuiltin("len"))
		.register(new InitBuiltin("init"))
		.register(new DefBuiltin("def"));

	for (const [name, op] of ARITHMETIC) {
		registry.register(new ArithmeticBuiltin(name, op));
	}
	return registry;
}
