import chalk from "chalk";

export type Debug = (message: string) => void;

export const noDebug: Debug = () => {};

/** Diagnostic lines prefixed `[httpstat]`, written only when enabled. */
export const createDebug = (
	enabled: boolean,
	write: (text: string) => void,
): Debug =>
	enabled ? (message) => write(`${chalk.gray("[httpstat]")} ${message}`) : noDebug;
