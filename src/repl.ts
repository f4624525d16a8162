import chalk from "chalk";
import { createInterface } from "node:readline";
import { ReplConfig } from "./config";
import { createGlobalEnvironment, run, VERSION } from "./couchlisp";
import { Environment } from "./env";

export interface ReplOptions extends ReplConfig {
	input: NodeJS.ReadableStream;
	output: NodeJS.WritableStream;
	env?: Environment;
}

/**
 * Runs the read-eval-print loop until the input closes. Every line is
 * evaluated against one shared environment, so `def` persists between lines.
 */
export function startRepl(options: ReplOptions): Promise<void> {
	const { input, output, prompt, historySize } = options;
	const env = options.env ?? createGlobalEnvironment();
	const paint = options.color ? chalk : new chalk.Instance({ level: 0 });
	const write = (line: string) => {
		output.write(line + "\n");
	};

	if (options.banner) {
		write(paint.bold(`Lispy Couch Version ${VERSION}`));
		write("Press 'ctrl-c' to exit\n");
	}

	const rl = createInterface({ input, output, prompt, historySize });

	rl.on("line", line => {
		const result = run(line, env);
		const failed = !result.ok || result.value.type === "Error";
		write(failed ? paint.red(result.output) : result.output);
		rl.prompt();
	});

	rl.on("SIGINT", () => rl.close());

	const closed = new Promise<void>(resolve => {
		rl.on("close", () => resolve());
	});
	rl.prompt();
	return closed;
}
