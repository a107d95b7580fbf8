import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
		env: {
			COVENANT_LOG_LEVEL: "silent",
		},
	},
});
