// CHANGE: Vitest configuration for the Composer orchestration
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects outside temp directories

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import describe/it/expect from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
