import { z } from "zod";
import { MetricsParseError } from "./errors.ts";

export const curlMetricsSchema = z.object({
	time_namelookup: z.number(),
	time_connect: z.number(),
	time_appconnect: z.number(),
	time_pretransfer: z.number(),
	time_redirect: z.number(),
	time_starttransfer: z.number(),
	time_total: z.number(),
	speed_download: z.number(),
	speed_upload: z.number(),
	remote_ip: z.string(),
	remote_port: z.number().int().nonnegative(),
	local_ip: z.string(),
	local_port: z.number().int().nonnegative(),
});

export type CurlMetrics = Readonly<z.infer<typeof curlMetricsSchema>>;

type MetricField = keyof CurlMetrics;

/** Write-out variables in the order curl is asked to print them. */
export const METRIC_FIELDS = [
	"time_namelookup",
	"time_connect",
	"time_appconnect",
	"time_pretransfer",
	"time_redirect",
	"time_starttransfer",
	"time_total",
	"speed_download",
	"speed_upload",
	"remote_ip",
	"remote_port",
	"local_ip",
	"local_port",
] as const satisfies readonly MetricField[];

const STRING_FIELDS = new Set<MetricField>(["remote_ip", "local_ip"]);

/**
 * curl `-w` template expanding to the metrics record as one line of JSON.
 * String variables are quoted, numeric ones are emitted bare.
 */
export const WRITE_OUT_FORMAT = `{${METRIC_FIELDS.map((field) =>
	STRING_FIELDS.has(field)
		? `"${field}": "%{${field}}"`
		: `"${field}": %{${field}}`,
).join(", ")}}`;

const describeIssues = (error: z.ZodError) =>
	error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");

export const parseMetrics = (raw: string): CurlMetrics => {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new MetricsParseError(reason, { cause: error });
	}

	const result = curlMetricsSchema.safeParse(json);
	if (!result.success) {
		throw new MetricsParseError(describeIssues(result.error), {
			cause: result.error,
		});
	}
	return result.data;
};

export const serializeMetrics = (metrics: CurlMetrics) =>
	JSON.stringify(
		Object.fromEntries(METRIC_FIELDS.map((field) => [field, metrics[field]])),
	);
