import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["tests/**/*.test.ts"],
		env: {
			LOG_LEVEL: "error",
		},
		testTimeout: 20000,
	},
});
