import { ParseNode } from "./ast";
import { err, INT64_MAX, INT64_MIN, num, qexpr, sexpr, sym, Value } from "./value";

const DELIMITERS = new Set(["(", ")", "{", "}"]);
const INTEGER_RE = /^-?[0-9]+$/;

function readNumber(text: string): Value {
	if (!INTEGER_RE.test(text)) return err("InvalidNumber");
	const n = BigInt(text);
	if (n < INT64_MIN || n > INT64_MAX) return err("InvalidNumber");
	return num(n);
}

/** Converts a parse tree into a value tree. Never fails: bad numbers read as errors. */
export function read(node: ParseNode): Value {
	if (node.tag.includes("number")) return readNumber(node.contents);
	if (node.tag.includes("symbol")) return sym(node.contents);

	// the root marker, sexpr, and any other composite node all read as an S-Expression
	const list = node.tag.includes("qexpr") ? qexpr() : sexpr();

	for (const child of node.children) {
		if (DELIMITERS.has(child.contents)) continue;
		if (child.tag === "regex") continue;
		list.cells.push(read(child));
	}

	return list;
}
