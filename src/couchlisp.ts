import { ParseNode } from "./ast";
import { createBuiltinRegistry } from "./builtins";
import { Environment } from "./env";
import { ParseError } from "./errors";
import { evaluate } from "./evaluator";
import { lex } from "./lexer";
import { parse } from "./parser";
import { printValue } from "./printer";
import { read } from "./reader";
import { Value } from "./value";

export const VERSION = "0.3.0";

export function createGlobalEnvironment(): Environment {
	const env = new Environment();
	createBuiltinRegistry().install(env);
	return env;
}

export type RunResult =
	| { ok: true; value: Value; output: string }
	| { ok: false; error: ParseError; output: string };

/** Reads, evaluates and prints one line of input against `env`. */
export function run(src: string, env: Environment): RunResult {
	let tree: ParseNode;
	try {
		tree = parse(lex(src));
	} catch (e) {
		if (e instanceof ParseError) return { ok: false, error: e, output: e.message };
		throw e;
	}

	const value = evaluate(env, read(tree));
	return { ok: true, value, output: printValue(value) };
}
