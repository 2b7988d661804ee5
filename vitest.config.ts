import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**"],
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
			{ find: /^@tallybook\/core$/, replacement: src("core/src/index.ts") },
			{ find: /^@tallybook\/memory-adapter$/, replacement: src("memory-adapter/src/index.ts") },
			{ find: /^@tallybook\/kysely-adapter$/, replacement: src("kysely-adapter/src/index.ts") },
			{ find: /^@tallybook\/test-utils$/, replacement: src("test-utils/src/index.ts") },
			{ find: /^tallybook\/api$/, replacement: src("tallybook/src/api/index.ts") },
			{ find: /^tallybook$/, replacement: src("tallybook/src/index.ts") },
		],
	},
});
