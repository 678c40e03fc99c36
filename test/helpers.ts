import fs from "node:fs";
import type { ExecResult, Executor } from "../src/exec.ts";
import type { CurlMetrics } from "../src/metrics.ts";

export const sampleMetrics: CurlMetrics = {
	time_namelookup: 0.0625,
	time_connect: 0.125,
	time_appconnect: 0.25,
	time_pretransfer: 0.25,
	time_redirect: 0,
	time_starttransfer: 0.5,
	time_total: 0.75,
	speed_download: 2048,
	speed_upload: 0,
	remote_ip: "192.0.2.10",
	remote_port: 80,
	local_ip: "10.0.0.2",
	local_port: 54321,
};

type FakeResponse = Partial<ExecResult> & {
	headers?: string;
	body?: string | Buffer;
};

export type RecordedCall = { command: string; args: string[] };

const argAfter = (args: string[], flag: string) => {
	const index = args.indexOf(flag);
	if (index === -1 || index + 1 >= args.length) {
		throw new Error(`${flag} missing from curl arguments`);
	}
	return args[index + 1];
};

/**
 * Stands in for the curl process: writes the header and body files curl was
 * pointed at and answers with the given stdout, stderr and exit code.
 */
export const fakeCurl = (response: FakeResponse = {}) => {
	const calls: RecordedCall[] = [];

	const exec: Executor = async (command, args) => {
		calls.push({ command, args: [...args] });
		const exitCode = response.exitCode ?? 0;
		if (exitCode === 0) {
			if (response.headers !== undefined) {
				await fs.promises.writeFile(argAfter(args, "-D"), response.headers);
			}
			if (response.body !== undefined) {
				await fs.promises.writeFile(argAfter(args, "-o"), response.body);
			}
		}
		return {
			stdout: response.stdout ?? JSON.stringify(sampleMetrics),
			stderr: response.stderr ?? "",
			exitCode,
		};
	};

	return { exec, calls, argAfter };
};
