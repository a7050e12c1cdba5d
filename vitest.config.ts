import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function packageSource(file: string): string {
	return fileURLToPath(new URL(`./packages/${file}`, import.meta.url));
}

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "packages/integration-tests/**"],
			thresholds: {
				lines: 80,
				branches: 75,
				functions: 80,
				statements: 80,
			},
		},
	},
	resolve: {
		alias: [
			{ find: "@rowbind/core/db", replacement: packageSource("core/src/db/index.ts") },
			{ find: "@rowbind/core/error", replacement: packageSource("core/src/error/index.ts") },
			{ find: "@rowbind/core/logger", replacement: packageSource("core/src/logger/index.ts") },
			{ find: "@rowbind/core", replacement: packageSource("core/src/index.ts") },
			{ find: "@rowbind/kysely-adapter", replacement: packageSource("kysely-adapter/src/index.ts") },
			{ find: "@rowbind/pg-adapter", replacement: packageSource("pg-adapter/src/index.ts") },
		],
	},
});
