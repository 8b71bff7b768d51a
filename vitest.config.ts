import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"aop-log": fileURLToPath(new URL("./packages/aop-log/src/index.ts", import.meta.url)),
		},
	},
	test: {
		include: ["packages/*/test/**/*.test.ts"],
	},
});
