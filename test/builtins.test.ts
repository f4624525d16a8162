import { createBuiltinRegistry } from "../src/builtins";
import { createGlobalEnvironment, run } from "../src/couchlisp";
import { Environment } from "../src/env";
import { printValue } from "../src/printer";
import { num, qexpr, sexpr } from "../src/value";

const evalSrc = (src: string, env: Environment = createGlobalEnvironment()) => run(src, env).output;

describe("1. Arithmetic", () => {

	test("left fold", () => {
		expect(evalSrc("+ 1 2 3")).toBe("6");
		expect(evalSrc("- 10 1 2")).toBe("7");
		expect(evalSrc("* 2 3 4")).toBe("24");
		expect(evalSrc("/ 100 5 2")).toBe("10");
		expect(evalSrc("% 10 3")).toBe("1");
	});

	test("unary minus negates", () => {
		expect(evalSrc("(- 5)")).toBe("-5");
		expect(evalSrc("(- -5)")).toBe("5");
	});

	test("division truncates toward zero", () => {
		expect(evalSrc("/ 7 2")).toBe("3");
		expect(evalSrc("/ -7 2")).toBe("-3");
		expect(evalSrc("% -7 2")).toBe("-1");
	});

	test("division by zero", () => {
		expect(evalSrc("(/ 4 0)")).toBe("Error: Division by zero!");
		expect(evalSrc("(% 4 0)")).toBe("Error: Division by zero!");
		expect(evalSrc("(/ 4 0 2)")).toBe("Error: Division by zero!");
	});

	test("word aliases", () => {
		expect(evalSrc("add 1 2")).toBe("3");
		expect(evalSrc("sub 1 2")).toBe("-1");
		expect(evalSrc("mul 3 3")).toBe("9");
		expect(evalSrc("div 9 3")).toBe("3");
		expect(evalSrc("mod 9 4")).toBe("1");
	});

	test("exp, min, max", () => {
		expect(evalSrc("exp 2 10")).toBe("1024");
		expect(evalSrc("exp 2 3 2")).toBe("64");
		expect(evalSrc("exp 2 -1")).toBe("0");
		expect(evalSrc("exp -1 -3")).toBe("-1");
		expect(evalSrc("exp 0 -1")).toBe("Error: Division by zero!");
		expect(evalSrc("min 5 2 8")).toBe("2");
		expect(evalSrc("max 5 2 8")).toBe("8");
	});

	test("wraps at 64 bits", () => {
		expect(evalSrc("+ 9223372036854775807 1")).toBe("-9223372036854775808");
		expect(evalSrc("exp 2 64")).toBe("0");
	});

	test("non-numbers are type errors naming the argument", () => {
		expect(evalSrc("(+ 1 {2 3})")).toBe(
			"Error: Cannot operate on a non-number! Function '+' passed incorrect type for argument 1! Got Q-Expression, Expected Number."
		);
		expect(evalSrc("(* {} 1)")).toBe(
			"Error: Cannot operate on a non-number! Function '*' passed incorrect type for argument 0! Got Q-Expression, Expected Number."
		);
	});
});

describe("2. List operations", () => {

	test("list re-tags its arguments", () => {
		expect(evalSrc("list 1 2 3")).toBe("{1 2 3}");
		expect(evalSrc("list 1 (+ 1 1) {3}")).toBe("{1 2 {3}}");
	});

	test("head", () => {
		expect(evalSrc("head {1 2 3}")).toBe("{1}");
		expect(evalSrc("head {}")).toBe("Error: Function 'head' passed {}!");
		expect(evalSrc("head {1} {2}")).toBe("Error: Function 'head' passed incorrect number of arguments. Got 2, Expected 1!");
		expect(evalSrc("head 1")).toBe("Error: Function 'head' passed incorrect type for argument 0! Got Number, Expected Q-Expression.");
	});

	test("tail", () => {
		expect(evalSrc("tail {1 2 3}")).toBe("{2 3}");
		expect(evalSrc("tail {1}")).toBe("{}");
		expect(evalSrc("tail {}")).toBe("Error: Function 'tail' passed {}!");
	});

	test("init", () => {
		expect(evalSrc("init {1 2 3}")).toBe("{1 2}");
		expect(evalSrc("init {}")).toBe("Error: Function 'init' passed {}!");
	});

	test("len", () => {
		expect(evalSrc("len {1 2 3}")).toBe("3");
		expect(evalSrc("len {}")).toBe("0");
		expect(evalSrc("len (init {1 2 3})")).toBe("2");
		expect(evalSrc("len 1")).toBe("Error: Function 'len' passed incorrect type for argument 0! Got Number, Expected Q-Expression.");
	});

	test("join", () => {
		expect(evalSrc("join {1} {2 3} {}")).toBe("{1 2 3}");
		expect(evalSrc("join {1} 2")).toBe("Error: Function 'join' passed incorrect type for argument 1! Got Number, Expected Q-Expression.");
	});

	test("joining head and tail rebuilds the list", () => {
		expect(evalSrc("join (head {1 {2} 3}) (tail {1 {2} 3})")).toBe("{1 {2} 3}");
	});

	test("cons", () => {
		expect(evalSrc("cons 1 {2 3}")).toBe("{1 2 3}");
		expect(evalSrc("cons {1} {2}")).toBe("{{1} 2}");
		expect(evalSrc("cons 1")).toBe("Error: Function 'cons' passed incorrect number of arguments. Got 1, Expected 2!");
		expect(evalSrc("cons + {1}")).toBe(
			"Error: Function 'cons' passed incorrect type for argument 0! Got Function, Expected Number or Q-Expression."
		);
		expect(evalSrc("cons 1 2")).toBe("Error: Function 'cons' passed incorrect type for argument 1! Got Number, Expected Q-Expression.");
	});

	test("eval", () => {
		expect(evalSrc("(eval (list + 1 2))")).toBe("3");
		expect(evalSrc("eval {+ 1 2}")).toBe("3");
		expect(evalSrc("eval {5}")).toBe("5");
		expect(evalSrc("eval {}")).toBe("()");
		expect(evalSrc("(eval (list 1 2 3))")).toBe("Error: First element is not a function");
		expect(evalSrc("eval 1")).toBe("Error: Function 'eval' passed incorrect type for argument 0! Got Number, Expected Q-Expression.");
	});
});

describe("3. def", () => {

	test("binds names pairwise", () => {
		const env = createGlobalEnvironment();
		expect(evalSrc("def {x y} 1 2", env)).toBe("()");
		expect(evalSrc("x", env)).toBe("1");
		expect(evalSrc("y", env)).toBe("2");
		expect(evalSrc("+ x y", env)).toBe("3");
	});

	test("count mismatch binds nothing", () => {
		const env = createGlobalEnvironment();
		expect(evalSrc("def {x} 1 2", env)).toBe(
			"Error: Function 'def' cannot define incorrect number of values to symbols. Got 2, Expected 1!"
		);
		expect(env.has("x")).toBe(false);
	});

	test("non-symbol names bind nothing", () => {
		const env = createGlobalEnvironment();
		expect(evalSrc("def {x 1} 1 2", env)).toBe(
			"Error: Cannot define non-symbol! Function 'def' passed incorrect type for argument 0! Got Number, Expected Symbol."
		);
		expect(env.has("x")).toBe(false);
	});

	test("names must be a q-expression", () => {
		expect(evalSrc("def 1 2")).toBe("Error: Function 'def' passed incorrect type for argument 0! Got Number, Expected Q-Expression.");
	});

	test("lists as values, evaluated later", () => {
		const env = createGlobalEnvironment();
		evalSrc("def {q} {1 2}", env);
		expect(evalSrc("q", env)).toBe("{1 2}");
		expect(evalSrc("eval (join {+} q)", env)).toBe("3");
	});

	test("builtins can be redefined", () => {
		const env = createGlobalEnvironment();
		evalSrc("def {add} 5", env);
		expect(evalSrc("add", env)).toBe("5");
		expect(evalSrc("+ 1 2", env)).toBe("3");
	});

	test("empty definition list", () => {
		expect(evalSrc("def {}")).toBe("()");
	});
});

describe("4. Registry", () => {

	const registry = createBuiltinRegistry();

	test("installs every builtin", () => {
		expect(registry.names()).toEqual([
			"list", "head", "tail", "eval", "join", "cons", "len", "init", "def",
			"+", "-", "*", "/", "%", "add", "sub", "mul", "div", "mod", "exp", "min", "max",
		]);
		const env = new Environment();
		registry.install(env);
		expect(env.names()).toEqual(registry.names());
	});

	test("looks up implementations by name", () => {
		expect(registry.get("head")?.name).toBe("head");
		expect(registry.get("add")?.name).toBe("add");
		expect(registry.get("nope")).toBeUndefined();
	});

	test("unknown names release their arguments", () => {
		const args = sexpr([num(1n)]);
		const out = registry.apply("nope", new Environment(), args);
		expect(printValue(out)).toBe("Error: Unknown Function 'nope'!");
		expect(args.cells).toHaveLength(0);
	});

	test("failed checks release the argument bundle", () => {
		const args = sexpr([qexpr([num(1n)]), num(2n)]);
		registry.apply("head", new Environment(), args);
		expect(args.cells).toHaveLength(0);
	});

	test("list forwards its cells without copying", () => {
		const cells = [num(1n)];
		const out = registry.apply("list", new Environment(), sexpr(cells));
		expect(out.type).toBe("QExpr");
		if (out.type === "QExpr") expect(out.cells).toBe(cells);
	});

	test("zero-argument edge cases", () => {
		const env = new Environment();
		expect(printValue(registry.apply("+", env, sexpr()))).toBe(
			"Error: Function '+' passed incorrect number of arguments. Got 0, Expected at least 1!"
		);
		expect(printValue(registry.apply("join", env, sexpr()))).toBe("{}");
		expect(printValue(registry.apply("def", env, sexpr()))).toBe(
			"Error: Function 'def' passed incorrect number of arguments. Got 0, Expected at least 1!"
		);
	});
});
