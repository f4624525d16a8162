import { copyValue, err, Value } from "./value";

/**
 * The single global symbol table. Values go in and come out as copies, so
 * nothing the evaluator holds is ever shared with a binding.
 */
export class Environment {
	private readonly syms: string[] = [];
	private readonly vals: Value[] = [];

	lookup(name: string): Value {
		const i = this.syms.indexOf(name);
		if (i === -1) return err("UnboundSymbol", { symbol: name });
		return copyValue(this.vals[i]);
	}

	bind(name: string, value: Value): void {
		const i = this.syms.indexOf(name);
		if (i !== -1) {
			this.vals[i] = copyValue(value);
			return;
		}
		this.syms.push(name);
		this.vals.push(copyValue(value));
	}

	has(name: string): boolean {
		return this.syms.includes(name);
	}

	names(): string[] {
		return [...this.syms];
	}
}
