// CHANGE: Vitest configuration for the prefscope test suite
// PURITY: SHELL (configuration only)
// INVARIANT: Tests import describe/it/expect explicitly; no shared state between tests
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false,
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// INVARIANT: ∀ f ∈ src/core/**/*.ts: coverage(f) stays high; SHELL has a floor only
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 90,
					lines: 90,
					statements: 90,
				},
				global: {
					branches: 10,
					functions: 10,
					lines: 10,
					statements: 10,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
