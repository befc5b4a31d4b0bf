import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/**/*.test.ts", "packages/**/*.spec.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		pool: "forks",
		poolOptions: {
			forks: {
				singleFork: true,
			},
		},
		// Supervisor and e2e tests time real child processes
		sequence: {
			concurrent: false,
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/*.test.ts", "**/__tests__/**", "packages/e2e/**", "**/index.ts"],
		},
		testTimeout: 30000, // e2e suites set longer timeouts per test
		hookTimeout: 30000,
	},
});
