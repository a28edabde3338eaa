import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: [
				"src/cli/**",
				"src/ui.ts",
				"src/progress.ts",
				"src/prompts.ts",
				"src/spinner.ts",
				"src/logger.ts",
			],
			thresholds: {
				// Identity and classification decide what the catalog contains
				"src/identity.ts": { statements: 90, branches: 80 },
				"src/classify.ts": { statements: 90, branches: 80 },
				"src/launch/args.ts": { statements: 90, branches: 80 },
				// IO modules - reliability critical
				"src/catalog/store.ts": { statements: 80 },
				"src/scan/scanner.ts": { statements: 80 },
				"src/scan/stats.ts": { statements: 90 },
			},
		},
	},
})
