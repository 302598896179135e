import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		watch: false,
		fileParallelism: true,
		include: ["tests/**/*.test.ts"],
		exclude: ["node_modules"],
		globalSetup: ["./tests/global-setup.ts"],
	},
	resolve: {
		alias: {
			faultline: fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
			"@faultline/deploy": fileURLToPath(new URL("./packages/deploy/src/index.ts", import.meta.url)),
		},
	},
});
