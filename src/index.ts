import chalk from "chalk";
import { type HttpstatConfig, loadConfig } from "./config.ts";
import {
	buildCurlArgs,
	createTempFiles,
	formatCommand,
	readTempFile,
	releaseTempFiles,
	runCurl,
} from "./curl.ts";
import { createDebug } from "./debug.ts";
import { type Executor, spawnExecutor } from "./exec.ts";
import { type CurlMetrics, parseMetrics } from "./metrics.ts";
import {
	renderBody,
	renderConnection,
	renderHeaders,
	renderMetricsJson,
	renderSpeed,
	renderTimingChart,
} from "./render.ts";
import { isHttps } from "./timing.ts";
import { validateCurlArgs } from "./validate.ts";

export type Printer = (text: string) => void;

export type HttpstatOptions = {
	/** Target URL, passed to curl as the last argument */
	url: string;
	/** Extra curl options, forwarded unchanged */
	curlArgs?: string[];
	/** Defaults to the configuration read from the environment */
	config?: HttpstatConfig;
	/** Runs the curl process */
	exec?: Executor;
	/** Receives every line of user-facing output */
	print?: Printer;
	/** Receives diagnostics: debug traces and, in metrics-only mode, the command line */
	printError?: Printer;
};

// biome-ignore lint/suspicious/noConsole: this is the CLI's output
export const consolePrinter: Printer = (text) => console.log(text);
// biome-ignore lint/suspicious/noConsole: diagnostics go to stderr
export const consoleErrorPrinter: Printer = (text) => console.error(text);

/**
 * Request `url` through curl and print its timing breakdown. Resolves with
 * the parsed metrics; any failure rejects with an {@link HttpstatError}
 * before further output is printed.
 *
 * The body file outlives the run only once its path has been printed.
 */
export const run = async (options: HttpstatOptions): Promise<CurlMetrics> => {
	const config = options.config ?? loadConfig();
	const curlArgs = options.curlArgs ?? [];
	const exec = options.exec ?? spawnExecutor;
	const print = options.print ?? consolePrinter;
	const printError = options.printError ?? consoleErrorPrinter;
	const debug = createDebug(config.debug, printError);

	validateCurlArgs(curlArgs);

	const files = await createTempFiles(debug);
	let bodyReported = false;

	const measure = async () => {
		const args = buildCurlArgs(config, options.url, curlArgs, files);
		if (config.debug) {
			// Keep stdout pure JSON in metrics-only mode
			const printCommand = config.metricsOnly ? printError : print;
			printCommand(
				`${chalk.blueBright("Executing:")} ${formatCommand(config.curlBin, args)}`,
			);
		}

		const stdout = await runCurl(config, args, exec, debug);
		const metrics = parseMetrics(stdout);

		if (config.metricsOnly) {
			print(renderMetricsJson(metrics));
			return metrics;
		}

		// Read both files before printing anything so an I/O error leaves no partial output
		const headers = await readTempFile(files.headers, "headers");
		const body = await readTempFile(files.body, "body");

		if (config.showIp) {
			print(renderConnection(metrics));
		}
		for (const line of renderHeaders(headers.toString("utf8"))) {
			print(line);
		}
		for (const line of renderBody(body, files.body, config)) {
			print(line);
		}
		bodyReported = config.saveBody;
		print(renderTimingChart(metrics, isHttps(options.url), debug));
		if (config.showSpeed) {
			print(renderSpeed(metrics));
		}

		return metrics;
	};

	let metrics: CurlMetrics;
	try {
		metrics = await measure();
	} catch (error) {
		// The cleanup error must not replace the one that ended the run
		await releaseTempFiles(files, bodyReported, debug).catch(
			(cleanupError: unknown) =>
				debug(
					cleanupError instanceof Error
						? cleanupError.message
						: String(cleanupError),
				),
		);
		throw error;
	}

	await releaseTempFiles(files, bodyReported, debug);
	debug(`Run finished for ${options.url}`);
	return metrics;
};

export {
	DEFAULT_CONFIG,
	ENV,
	type HttpstatConfig,
	loadConfig,
} from "./config.ts";
export {
	ArgumentError,
	CurlError,
	HttpstatError,
	MetricsParseError,
} from "./errors.ts";
export type { ExecResult, Executor } from "./exec.ts";
export {
	type CurlMetrics,
	parseMetrics,
	serializeMetrics,
	WRITE_OUT_FORMAT,
} from "./metrics.ts";
export { computePhases, isHttps, type Phases } from "./timing.ts";
export { validateCurlArgs } from "./validate.ts";
