import { ArgumentError } from "./errors.ts";

/** Flags httpstat passes to curl itself; overriding them breaks output capture. */
export const EXCLUDED_FLAGS = [
	"-w",
	"-D",
	"-o",
	"-s",
	"--write-out",
	"--dump-header",
	"--output",
	"--silent",
] as const;

export const isExcludedFlag = (arg: string) =>
	EXCLUDED_FLAGS.some((flag) => arg === flag || arg.startsWith(`${flag}=`));

export const validateCurlArgs = (args: readonly string[]) => {
	const disallowed = args.filter(isExcludedFlag);
	if (disallowed.length > 0) {
		throw new ArgumentError(disallowed);
	}
};
