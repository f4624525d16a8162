#!/usr/bin/env node
import { loadConfig } from "./config";
import { startRepl } from "./repl";

async function main() {
	const config = loadConfig();
	await startRepl({ ...config, input: process.stdin, output: process.stdout });
	process.stdout.write("\nThank you\n");
}

main().catch(err => {
	console.error(err instanceof Error ? err.message : err);
	process.exit(1);
});
