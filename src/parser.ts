import { ParseNode, ROOT_TAG, Token } from "./ast";
import { ParseError } from "./errors";

const CLOSERS = { LPAREN: "RPAREN", LBRACE: "RBRACE" } as const;

function leaf(tag: string, contents: string): ParseNode {
	return { tag, contents, children: [] };
}

function describeToken(t: Token): string {
	return t.type === "EOF" ? "end of input" : `'${t.value}'`;
}

export function parse(tokens: Token[]): ParseNode {
	let pos = 0;
	const peek = () => tokens[Math.min(pos, tokens.length - 1)];
	const consume = () => tokens[pos++];

	function parseExpr(): ParseNode {
		const t = peek();

		if (t.type === "NUMBER") {
			consume();
			return leaf("expr|number|regex", t.value);
		}

		if (t.type === "SYMBOL") {
			consume();
			return leaf("expr|symbol|regex", t.value);
		}

		if (t.type === "LPAREN" || t.type === "LBRACE") {
			consume();
			const closer = CLOSERS[t.type];
			const children: ParseNode[] = [leaf("char", t.value)];

			while (true) {
				const p = peek();
				if (p.type === closer) break;
				if (p.type === "EOF") {
					const expected = closer === "RPAREN" ? ")" : "}";
					throw new ParseError(`expected '${expected}' but found end of input`, p.line, p.col);
				}
				children.push(parseExpr());
			}

			children.push(leaf("char", consume().value));
			const rule = t.type === "LPAREN" ? "sexpr" : "qexpr";
			return { tag: `expr|${rule}|>`, contents: "", children };
		}

		throw new ParseError(`unexpected ${describeToken(t)}`, t.line, t.col);
	}

	const children: ParseNode[] = [leaf("regex", "")];
	while (peek().type !== "EOF") {
		children.push(parseExpr());
	}
	children.push(leaf("regex", ""));

	return { tag: ROOT_TAG, contents: "", children };
}
