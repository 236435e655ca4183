import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		testTimeout: 10000,
		hookTimeout: 10000,
		include: ["packages/*/test/**/*.test.ts", "server/test/**/*.test.ts"]
	}
});
