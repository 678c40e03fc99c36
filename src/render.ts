import chalk from "chalk";
import type { HttpstatConfig } from "./config.ts";
import { type Debug, noDebug } from "./debug.ts";
import type { CurlMetrics } from "./metrics.ts";
import { computePhases } from "./timing.ts";

export const BODY_PREVIEW_BYTES = 1024;

export const renderConnection = (metrics: CurlMetrics) =>
	`${chalk.blue("IP Info:")} ${metrics.local_ip}:${metrics.local_port}  ⇄  ${metrics.remote_ip}:${metrics.remote_port}`;

/**
 * Style each header line: `Name:` dim and the value cyan. Lines without a
 * colon (status lines, the blank separator) are green.
 */
export const renderHeaders = (raw: string) => {
	const lines = raw.split(/\r?\n/);
	if (lines[lines.length - 1] === "") lines.pop();

	return lines.map((line) => {
		const idx = line.indexOf(":");
		if (idx === -1) return chalk.green(line);
		return `${chalk.gray(line.slice(0, idx + 1))}${chalk.cyan(line.slice(idx + 1))}`;
	});
};

/**
 * Body output lines: a preview when `showBody` is set, then the saved path
 * when `saveBody` is set. The preview cuts at a byte offset and may split a
 * multi-byte character.
 */
export const renderBody = (
	body: Buffer,
	bodyPath: string,
	config: Pick<HttpstatConfig, "showBody" | "saveBody">,
) => {
	const lines: string[] = [];
	if (config.showBody) {
		lines.push(
			body.length > BODY_PREVIEW_BYTES
				? `${body.subarray(0, BODY_PREVIEW_BYTES).toString("utf8")}${chalk.cyan("...")}`
				: body.toString("utf8"),
		);
	}
	if (config.saveBody) {
		lines.push(`${chalk.green("Body")} stored in: ${bodyPath}`);
	}
	return lines;
};

export const renderSpeed = (metrics: CurlMetrics) =>
	`${chalk.greenBright("Download:")} ${(metrics.speed_download / 1024).toFixed(1)} KiB/s, ${chalk.greenBright("Upload:")} ${(metrics.speed_upload / 1024).toFixed(1)} KiB/s`;

export const renderMetricsJson = (metrics: CurlMetrics) =>
	JSON.stringify(metrics, null, 2);

// Extra space goes on the right
const center = (text: string, width: number) => {
	const padding = Math.max(0, width - text.length);
	const left = Math.floor(padding / 2);
	return `${" ".repeat(left)}${chalk.cyan(text)}${" ".repeat(padding - left)}`;
};

const label = (seconds: number) => {
	const text = `${(seconds * 1000).toFixed(2)}ms`;
	return `${chalk.cyan(text)}${" ".repeat(Math.max(0, 8 - text.length))}`;
};

export const renderTimingChart = (
	metrics: CurlMetrics,
	https: boolean,
	debug: Debug = noDebug,
) => {
	const p = computePhases(metrics, https, debug);
	const ms = (value: number) => `${value}ms`;

	if (https) {
		return [
			"",
			"  DNS Lookup   TCP Connection   TLS Handshake   Server Processing   Content Transfer",
			`[${center(ms(p.dns), 12)}|${center(ms(p.connect), 16)}|${center(ms(p.tls), 15)}|${center(ms(p.server), 19)}|${center(ms(p.transfer), 18)}]`,
			"             |                |               |                   |                  |",
			`   namelookup:${label(metrics.time_namelookup)}        |               |                   |                  |`,
			`                       connect:${label(metrics.time_connect)}       |                   |                  |`,
			`                                   pretransfer:${label(metrics.time_pretransfer)}           |                  |`,
			`                                                     starttransfer:${label(metrics.time_starttransfer)}          |`,
			`                                                                                total:${label(metrics.time_total)}`,
		].join("\n");
	}

	return [
		"",
		"   DNS Lookup   TCP Connection   Server Processing   Content Transfer",
		`[${center(ms(p.dns), 13)}|${center(ms(p.connect), 16)}|${center(ms(p.server), 19)}|${center(ms(p.transfer), 18)}]`,
		"              |                |                   |                  |",
		`    namelookup:${label(metrics.time_namelookup)}        |                   |                  |`,
		`                        connect:${label(metrics.time_connect)}           |                  |`,
		`                                      starttransfer:${label(metrics.time_starttransfer)}          |`,
		`                                                                 total:${label(metrics.time_total)}`,
	].join("\n");
};
