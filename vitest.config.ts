import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		environment: "node",
		env: {
			POSTPACE_LOG_LEVEL: "silent",
		},
		testTimeout: 10_000,
	},
});
