import { type Debug, noDebug } from "./debug.ts";
import type { CurlMetrics } from "./metrics.ts";

export type Phases = {
	dns: number;
	connect: number;
	tls: number;
	server: number;
	transfer: number;
};

/** Literal prefix check; the URL is never parsed. */
export const isHttps = (url: string) => url.startsWith("https://");

const toMs = (seconds: number) => Math.trunc(seconds * 1000);

/**
 * Split curl's cumulative timers into per-phase durations in whole
 * milliseconds. The TLS phase only exists for https URLs.
 *
 * A phase that comes out negative (curl reports offsets out of order, e.g.
 * after a redirect) is clamped to 0, so the phases no longer add up to the
 * total in that case.
 */
export const computePhases = (
	metrics: CurlMetrics,
	https: boolean,
	debug: Debug = noDebug,
): Phases => {
	const clamp = (phase: keyof Phases, value: number) => {
		if (value >= 0) return value;
		debug(`Negative ${phase} phase (${value}ms), clamped to 0`);
		return 0;
	};

	const dns = clamp("dns", toMs(metrics.time_namelookup));
	const connect = clamp("connect", toMs(metrics.time_connect) - dns);
	const tls = https
		? clamp("tls", toMs(metrics.time_pretransfer) - dns - connect)
		: 0;
	const server = clamp(
		"server",
		toMs(metrics.time_starttransfer) - dns - connect - tls,
	);
	const transfer = clamp(
		"transfer",
		toMs(metrics.time_total) - dns - connect - tls - server,
	);

	return { dns, connect, tls, server, transfer };
};
