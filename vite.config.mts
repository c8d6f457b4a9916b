import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		exclude: ["**/node_modules", "**/dist"],
		coverage: {
			enabled: true,
			provider: "v8",
			reporter: ["text", "json-summary"],
			include: ["packages/**/*.ts"],
			exclude: ["**/node_modules/**", "**/tests/**", "**/test/**", "**/dist/**"],
		},
		testTimeout: 10000,
	},
});
