export class ParseError extends Error {
	readonly line: number;
	readonly col: number;

	constructor(detail: string, line: number, col: number, filename = "<stdin>") {
		super(`${filename}:${line}:${col}: error: ${detail}`);
		this.name = "ParseError";
		this.line = line;
		this.col = col;
	}
}

export class ConfigError extends Error {
	readonly variable: string;

	constructor(variable: string, detail: string) {
		super(`${variable}: ${detail}`);
		this.name = "ConfigError";
		this.variable = variable;
	}
}
