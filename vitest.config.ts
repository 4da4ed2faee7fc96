import { tmpdir } from "node:os";
import { join } from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		environment: "node",
		env: {
			LOG_LEVEL: "silent",
			DICTATION_LOG_DIR: join(tmpdir(), "dictation-test-logs"),
		},
	},
});
