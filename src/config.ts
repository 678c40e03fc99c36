export type HttpstatConfig = Readonly<{
	/** Print the first KiB of the response body */
	showBody: boolean;
	/** Print local and remote address pairs */
	showIp: boolean;
	/** Print download and upload throughput */
	showSpeed: boolean;
	/** Keep the body file on disk and report its path */
	saveBody: boolean;
	/** curl executable, looked up on PATH unless absolute */
	curlBin: string;
	/** Print the metrics record as JSON and nothing else */
	metricsOnly: boolean;
	/** Print the curl command line and diagnostic output */
	debug: boolean;
	/** Passed to curl as --max-time */
	timeoutSecs: number;
}>;

export const ENV = {
	showBody: "HTTPSTAT_SHOW_BODY",
	showIp: "HTTPSTAT_SHOW_IP",
	showSpeed: "HTTPSTAT_SHOW_SPEED",
	saveBody: "HTTPSTAT_SAVE_BODY",
	curlBin: "HTTPSTAT_CURL_BIN",
	metricsOnly: "HTTPSTAT_METRICS_ONLY",
	debug: "HTTPSTAT_DEBUG",
	timeoutSecs: "HTTPSTAT_TIMEOUT",
} as const satisfies Record<keyof HttpstatConfig, string>;

export const DEFAULT_CONFIG: HttpstatConfig = {
	showBody: false,
	showIp: true,
	showSpeed: false,
	saveBody: true,
	curlBin: "curl",
	metricsOnly: false,
	debug: false,
	timeoutSecs: 10,
};

const TRUTHY = new Set(["true", "1", "yes"]);
const FALSY = new Set(["false", "0", "no"]);

export const parseBoolean = (value: string | undefined, fallback: boolean) => {
	if (value === undefined) return fallback;
	const normalized = value.trim().toLowerCase();
	if (TRUTHY.has(normalized)) return true;
	if (FALSY.has(normalized)) return false;
	return fallback;
};

export const parseInteger = (value: string | undefined, fallback: number) => {
	if (value === undefined) return fallback;
	const trimmed = value.trim();
	if (!/^\d+$/.test(trimmed)) return fallback;
	const parsed = Number.parseInt(trimmed, 10);
	return Number.isSafeInteger(parsed) ? parsed : fallback;
};

/**
 * Build the run configuration from environment variables. Values that cannot
 * be parsed fall back to their default.
 */
export const loadConfig = (
	env: NodeJS.ProcessEnv = process.env,
): HttpstatConfig => {
	const curlBin = env[ENV.curlBin]?.trim();
	return Object.freeze({
		showBody: parseBoolean(env[ENV.showBody], DEFAULT_CONFIG.showBody),
		showIp: parseBoolean(env[ENV.showIp], DEFAULT_CONFIG.showIp),
		showSpeed: parseBoolean(env[ENV.showSpeed], DEFAULT_CONFIG.showSpeed),
		saveBody: parseBoolean(env[ENV.saveBody], DEFAULT_CONFIG.saveBody),
		curlBin: curlBin ? curlBin : DEFAULT_CONFIG.curlBin,
		metricsOnly: parseBoolean(
			env[ENV.metricsOnly],
			DEFAULT_CONFIG.metricsOnly,
		),
		debug: parseBoolean(env[ENV.debug], DEFAULT_CONFIG.debug),
		timeoutSecs: parseInteger(env[ENV.timeoutSecs], DEFAULT_CONFIG.timeoutSecs),
	});
};
