import chalk from "chalk";
import { Command, CommanderError } from "commander";
import packageJson from "../package.json" with { type: "json" };
import { ENV, loadConfig } from "./config.ts";
import { HttpstatError } from "./errors.ts";
import type { Executor } from "./exec.ts";
import {
	consoleErrorPrinter,
	consolePrinter,
	type Printer,
	run,
} from "./index.ts";

export const VERSION = packageJson.version;

const ENV_HELP = `
Environment:
  ${ENV.showBody}=true       Show response body
  ${ENV.showIp}=false        Disable IP info
  ${ENV.showSpeed}=true      Show speed
  ${ENV.saveBody}=false      Don't save body
  ${ENV.curlBin}=/my/curl    Use custom curl
  ${ENV.metricsOnly}=true    Print metrics as JSON only
  ${ENV.debug}=true           Enable debug log
  ${ENV.timeoutSecs}=10         Request timeout in seconds`;

export type MainDeps = {
	env?: NodeJS.ProcessEnv;
	exec?: Executor;
	stdout?: Printer;
	stderr?: Printer;
};

/**
 * Parse `argv` (without the node and script entries), run the request and
 * resolve with the process exit code.
 */
export const main = async (argv: string[], deps: MainDeps = {}) => {
	const stdout = deps.stdout ?? consolePrinter;
	const stderr = deps.stderr ?? consoleErrorPrinter;
	const program = new Command();

	program
		.name("httpstat")
		.description("Visualize curl request timings.")
		.usage("URL [CURL_OPTIONS]")
		.version(VERSION, "-v, --version", "Show version")
		.helpOption("-h, --help", "Show this help")
		.argument("[url]", "URL to request")
		.argument("[curlOptions...]", "options passed through to curl")
		.allowUnknownOption()
		.passThroughOptions()
		.addHelpText("after", chalk.blueBright(ENV_HELP))
		.exitOverride()
		.configureOutput({
			writeOut: (text) => stdout(text.replace(/\n$/, "")),
			writeErr: (text) => stderr(text.replace(/\n$/, "")),
		})
		.action(async (url: string | undefined, curlOptions: string[]) => {
			if (!url) {
				return program.help();
			}
			await run({
				url,
				curlArgs: curlOptions,
				config: loadConfig(deps.env),
				exec: deps.exec,
				print: stdout,
				printError: stderr,
			});
		});

	try {
		await program.parseAsync(argv, { from: "user" });
		return 0;
	} catch (error) {
		// Help and version come back as exit code 0
		if (error instanceof CommanderError) return error.exitCode;
		if (!(error instanceof HttpstatError)) throw error;
		stderr(chalk.red(error.message));
		return error.exitCode;
	}
};
