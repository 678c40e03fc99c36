import { defineConfig } from "tsdown";

export default defineConfig({
	entry: {
		index: "src/index.ts",
		cli: "src/cli.ts",
	},
	clean: true,
	format: ["esm"],
	platform: "node",
	target: "node20",
	treeshake: true,
	dts: true,
	outExtensions: () => ({ js: ".js", dts: ".d.ts" }),
});
