// CHANGE: Vitest configuration for the post-processor
// WHY: Native ESM, explicit test imports, Effect programs run through Effect.runPromise
// REF: REQ-TEST-TOOLING
// PURITY: SHELL (configuration only)
// INVARIANT: Tests are isolated; mocks are restored between tests

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Coverage with 100% threshold for the pure engine
		// WHY: CORE carries the convergence guarantees
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**", "src/index.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
