/**
 * Base class for every error that ends a run. `exitCode` is what the process
 * exits with when the error reaches the CLI.
 */
export class HttpstatError extends Error {
	readonly exitCode: number;

	constructor(message: string, exitCode = 1, options?: ErrorOptions) {
		super(message, options);
		this.name = "HttpstatError";
		this.exitCode = exitCode;
	}
}

/** A passthrough argument collides with a flag httpstat sets itself. */
export class ArgumentError extends HttpstatError {
	readonly disallowed: string[];

	constructor(disallowed: string[]) {
		super(
			`Disallowed curl option(s): ${disallowed.join(", ")}. httpstat sets -w, -D, -o and -s itself.`,
		);
		this.name = "ArgumentError";
		this.disallowed = disallowed;
	}
}

/** curl could not be started or exited non-zero. */
export class CurlError extends HttpstatError {
	readonly stderr: string;

	constructor(
		message: string,
		stderr: string,
		exitCode = 1,
		options?: ErrorOptions,
	) {
		super(message, exitCode, options);
		this.name = "CurlError";
		this.stderr = stderr;
	}
}

/** curl's write-out output was not the metrics JSON we asked for. */
export class MetricsParseError extends HttpstatError {
	constructor(message: string, options?: ErrorOptions) {
		super(`Failed to parse curl metrics: ${message}`, 1, options);
		this.name = "MetricsParseError";
	}
}
