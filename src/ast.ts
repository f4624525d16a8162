export type TokenType = "LPAREN" | "RPAREN" | "LBRACE" | "RBRACE" | "NUMBER" | "SYMBOL" | "EOF";

export type Token = {
	type: TokenType;
	value: string;
	line: number;
	col: number;
};

/**
 * Generic parse tree node. Tags follow the parser-combinator convention of
 * joining rule names with `|`, so consumers test them by substring:
 * `>` is the root, `regex` the start/end anchors, `char` a bracket.
 */
export type ParseNode = {
	tag: string;
	contents: string;
	children: ParseNode[];
};

export const ROOT_TAG = ">";
