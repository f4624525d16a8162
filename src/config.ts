import { ConfigError } from "./errors";

export interface ReplConfig {
	prompt: string;
	banner: boolean;
	color: boolean;
	historySize: number;
}

export const DEFAULT_CONFIG: ReplConfig = {
	prompt: "lc> ",
	banner: true,
	color: true,
	historySize: 100,
};

const isSet = (v: string | undefined) => v === "1" || v?.toLowerCase() === "true";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReplConfig {
	const config = { ...DEFAULT_CONFIG };

	if (env.COUCHLISP_PROMPT !== undefined) config.prompt = env.COUCHLISP_PROMPT;
	if (isSet(env.COUCHLISP_QUIET)) config.banner = false;
	if (env.NO_COLOR !== undefined) config.color = false;

	const history = env.COUCHLISP_HISTORY_SIZE;
	if (history !== undefined) {
		const n = Number(history);
		if (!/^\d+$/.test(history.trim()) || n <= 0) {
			throw new ConfigError("COUCHLISP_HISTORY_SIZE", `expected a positive integer, got '${history}'`);
		}
		config.historySize = n;
	}

	return config;
}
