import { describe, expect, it } from "vitest";
import { MetricsParseError } from "../src/errors.ts";
import {
	METRIC_FIELDS,
	parseMetrics,
	serializeMetrics,
	WRITE_OUT_FORMAT,
} from "../src/metrics.ts";
import { sampleMetrics } from "./helpers.ts";

describe("WRITE_OUT_FORMAT", () => {
	it("asks for every metric on one line, in order", () => {
		expect(WRITE_OUT_FORMAT).toBe(
			'{"time_namelookup": %{time_namelookup}, "time_connect": %{time_connect}, "time_appconnect": %{time_appconnect}, "time_pretransfer": %{time_pretransfer}, "time_redirect": %{time_redirect}, "time_starttransfer": %{time_starttransfer}, "time_total": %{time_total}, "speed_download": %{speed_download}, "speed_upload": %{speed_upload}, "remote_ip": "%{remote_ip}", "remote_port": %{remote_port}, "local_ip": "%{local_ip}", "local_port": %{local_port}}',
		);
		expect(WRITE_OUT_FORMAT).not.toContain("\n");
	});
});

describe("parseMetrics", () => {
	it("parses curl's expanded write-out", () => {
		const raw =
			'{"time_namelookup": 0.004152, "time_connect": 0.021337, "time_appconnect": 0.060001, "time_pretransfer": 0.060127, "time_redirect": 0.000000, "time_starttransfer": 0.112004, "time_total": 0.112530, "speed_download": 11213.000, "speed_upload": 0.000, "remote_ip": "192.0.2.10", "remote_port": 443, "local_ip": "10.0.0.2", "local_port": 51000}';
		expect(parseMetrics(raw)).toEqual({
			time_namelookup: 0.004152,
			time_connect: 0.021337,
			time_appconnect: 0.060001,
			time_pretransfer: 0.060127,
			time_redirect: 0,
			time_starttransfer: 0.112004,
			time_total: 0.11253,
			speed_download: 11213,
			speed_upload: 0,
			remote_ip: "192.0.2.10",
			remote_port: 443,
			local_ip: "10.0.0.2",
			local_port: 51000,
		});
	});

	it("round-trips through serializeMetrics exactly", () => {
		const metrics = {
			...sampleMetrics,
			time_namelookup: 0.1 + 0.2,
			speed_download: 123456.789,
		};
		expect(parseMetrics(serializeMetrics(metrics))).toEqual(metrics);
	});

	it("serializes fields in write-out order", () => {
		expect(Object.keys(JSON.parse(serializeMetrics(sampleMetrics)))).toEqual([
			...METRIC_FIELDS,
		]);
	});

	it("rejects output that is not JSON", () => {
		expect(() => parseMetrics("curl: (3) URL rejected")).toThrow(
			MetricsParseError,
		);
		expect(() => parseMetrics("")).toThrow(/^Failed to parse curl metrics: /);
	});

	it("reports a missing field", () => {
		const { time_total: _, ...partial } = sampleMetrics;
		expect(() => parseMetrics(JSON.stringify(partial))).toThrow(
			"Failed to parse curl metrics: time_total: Required",
		);
	});

	it("reports a field of the wrong type", () => {
		const raw = JSON.stringify({ ...sampleMetrics, remote_port: "80" });
		expect(() => parseMetrics(raw)).toThrow(
			"remote_port: Expected number, received string",
		);
	});

	it("keeps the underlying error as cause", () => {
		try {
			parseMetrics("{");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(MetricsParseError);
			if (!(error instanceof MetricsParseError)) return;
			expect(error.cause).toBeInstanceOf(SyntaxError);
		}
	});
});
