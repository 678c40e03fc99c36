import { spawn } from "node:child_process";

export interface ExecResult {
	stdout: string;
	stderr: string;
	exitCode: number;
}

/**
 * Runs a command to completion. Resolves with its output and exit code
 * whatever the exit code is; rejects only when the process cannot be spawned.
 */
export type Executor = (command: string, args: string[]) => Promise<ExecResult>;

export const spawnExecutor: Executor = (command, args) =>
	new Promise((resolve, reject) => {
		const child = spawn(command, args, {
			stdio: ["ignore", "pipe", "pipe"],
			env: process.env,
		});

		const stdoutChunks: Buffer[] = [];
		const stderrChunks: Buffer[] = [];

		child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
		child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

		child.on("error", reject);

		child.on("close", (exitCode) => {
			resolve({
				stdout: Buffer.concat(stdoutChunks).toString("utf8"),
				stderr: Buffer.concat(stderrChunks).toString("utf8"),
				// Killed by a signal
				exitCode: exitCode ?? 1,
			});
		});
	});
