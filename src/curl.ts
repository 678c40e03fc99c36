import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { HttpstatConfig } from "./config.ts";
import { type Debug, noDebug } from "./debug.ts";
import { CurlError, HttpstatError } from "./errors.ts";
import type { ExecResult, Executor } from "./exec.ts";
import { WRITE_OUT_FORMAT } from "./metrics.ts";

export type TempFiles = {
	dir: string;
	headers: string;
	body: string;
};

const reasonOf = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

/**
 * Create an empty headers file and body file in a fresh private directory.
 * curl does not create the `-o` file for an empty body, so both exist up front.
 */
export const createTempFiles = async (
	debug: Debug = noDebug,
): Promise<TempFiles> => {
	let dir: string;
	try {
		dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "httpstat-"));
	} catch (error) {
		throw new HttpstatError(
			`Failed to create temporary directory: ${reasonOf(error)}`,
			1,
			{ cause: error },
		);
	}

	const files = {
		dir,
		headers: path.join(dir, "headers"),
		body: path.join(dir, "body"),
	};

	try {
		await fs.promises.writeFile(files.headers, "");
		await fs.promises.writeFile(files.body, "");
	} catch (error) {
		await fs.promises.rm(dir, { recursive: true, force: true });
		throw new HttpstatError(
			`Failed to create temporary files in ${dir}: ${reasonOf(error)}`,
			1,
			{ cause: error },
		);
	}

	debug(`Temp files: headers=${files.headers} body=${files.body}`);
	return files;
};

/**
 * Remove the run's temp files. With `keepBody` only the headers file goes and
 * the body stays where it was reported.
 */
export const releaseTempFiles = async (
	files: TempFiles,
	keepBody: boolean,
	debug: Debug = noDebug,
) => {
	try {
		if (keepBody) {
			await fs.promises.rm(files.headers, { force: true });
			debug(`Kept body file ${files.body}`);
			return;
		}
		await fs.promises.rm(files.dir, { recursive: true, force: true });
		debug(`Removed ${files.dir}`);
	} catch (error) {
		throw new HttpstatError(
			`Failed to remove temporary files in ${files.dir}: ${reasonOf(error)}`,
			1,
			{ cause: error },
		);
	}
};

export const readTempFile = async (file: string, label: string) => {
	try {
		return await fs.promises.readFile(file);
	} catch (error) {
		throw new HttpstatError(
			`Failed to read ${label} file ${file}: ${reasonOf(error)}`,
			1,
			{ cause: error },
		);
	}
};

export const buildCurlArgs = (
	config: HttpstatConfig,
	url: string,
	extraArgs: readonly string[],
	files: Pick<TempFiles, "headers" | "body">,
) => [
	"-w",
	WRITE_OUT_FORMAT,
	"-D",
	files.headers,
	"-o",
	files.body,
	"-sS",
	"--max-time",
	String(config.timeoutSecs),
	...extraArgs,
	url,
];

const SHELL_SAFE = /^[A-Za-z0-9_\-./:=@%+,]+$/;

/** Render a command line the way it could be pasted into a POSIX shell. */
export const formatCommand = (command: string, args: readonly string[]) =>
	[command, ...args]
		.map((arg) =>
			SHELL_SAFE.test(arg) ? arg : `'${arg.replaceAll("'", `'\\''`)}'`,
		)
		.join(" ");

/**
 * Run curl once and return the write-out text it printed on stdout.
 * Throws {@link CurlError} when curl cannot start or exits non-zero.
 */
export const runCurl = async (
	config: HttpstatConfig,
	args: string[],
	exec: Executor,
	debug: Debug = noDebug,
) => {
	let result: ExecResult;
	try {
		result = await exec(config.curlBin, args);
	} catch (error) {
		throw new CurlError(
			`Failed to run ${config.curlBin}: ${reasonOf(error)}`,
			"",
			1,
			{ cause: error },
		);
	}

	debug(`${config.curlBin} exited with code ${result.exitCode}`);

	if (result.exitCode !== 0) {
		const stderr = result.stderr.trim();
		throw new CurlError(
			`curl error: ${stderr || `exited with code ${result.exitCode}`}`,
			result.stderr,
			result.exitCode,
		);
	}

	return result.stdout;
};
