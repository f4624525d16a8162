import { Token, TokenType } from "./ast";
import { ParseError } from "./errors";

const NUMBER_RE = /-?[0-9]+/y;
const SYMBOL_RE = /[a-zA-Z0-9_+\-*\/\\=<>!&%]+/y;

const PUNCTUATION: Record<string, TokenType> = {
	"(": "LPAREN",
	")": "RPAREN",
	"{": "LBRACE",
	"}": "RBRACE",
};

export function lex(input: string): Token[] {
	const tokens: Token[] = [];
	let i = 0;
	let line = 1;
	let col = 1;

	const isSpace = (c: string) => /\s/.test(c);

	const advance = (n: number) => {
		for (let k = 0; k < n; k++) {
			if (input[i] === "\n") {
				line++;
				col = 1;
			} else {
				col++;
			}
			i++;
		}
	};

	const matchAt = (re: RegExp): string | undefined => {
		re.lastIndex = i;
		const m = re.exec(input);
		return m ? m[0] : undefined;
	};

	while (i < input.length) {
		const ch = input[i];

		if (isSpace(ch)) {
			advance(1);
			continue;
		}

		const punct = PUNCTUATION[ch];
		if (punct) {
			tokens.push({ type: punct, value: ch, line, col });
			advance(1);
			continue;
		}

		// numbers win over symbols, so "-5" is a number and "-" a symbol
		const num = matchAt(NUMBER_RE);
		if (num !== undefined) {
			tokens.push({ type: "NUMBER", value: num, line, col });
			advance(num.length);
			continue;
		}

		const sym = matchAt(SYMBOL_RE);
		if (sym !== undefined) {
			tokens.push({ type: "SYMBOL", value: sym, line, col });
			advance(sym.length);
			continue;
		}

		throw new ParseError(`unexpected character '${ch}'`, line, col);
	}

	tokens.push({ type: "EOF", value: "", line, col });
	return tokens;
}
