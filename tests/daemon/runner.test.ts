import { chmodSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../../src/config/loader";
import type { Config } from "../../src/config/schema";
import { createDaemon } from "../../src/daemon/runner";
import { logger } from "../../src/utils/logger";
import { FakeEngine, chunkOf, makeModelFile } from "../helpers";

describe("createDaemon", () => {
	let dir: string;
	let config: Config;

	beforeEach(() => {
		const model = makeModelFile();
		dir = model.dir;
		const configFile = join(dir, "config.json");
		writeFileSync(
			configFile,
			JSON.stringify({
				model: { path: model.modelPath },
				audio: { sampleRate: 8000, channels: 1 },
				ipc: { socketPath: join(dir, "daemon.sock") },
			}),
		);
		chmodSync(configFile, 0o600);
		vi.stubEnv("DICTATION_MODEL_PATH", "");
		vi.stubEnv("DICTATION_SOCKET", "");
		config = loadConfig(configFile, true);
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		vi.restoreAllMocks();
		rmSync(dir, { recursive: true, force: true });
	});

	it("should log IPC server errors instead of throwing them", () => {
		const { server } = createDaemon(config, new FakeEngine());
		const error = vi.spyOn(logger, "error");

		expect(() =>
			server.emit("error", new Error("EMFILE: too many open files")),
		).not.toThrow();
		expect(error).toHaveBeenCalledTimes(1);
	});

	it("should start session buffers in the configured capture format", async () => {
		const { sessions } = createDaemon(config, new FakeEngine());
		const warn = vi.spyOn(logger, "warn");
		const id = await sessions.create();

		const result = await sessions.appendAudio(
			chunkOf(new Float32Array(4000), id, 8000, 1),
			0.1,
		);

		expect(result.durationSeconds).toBe(0.5);
		expect(warn).not.toHaveBeenCalled();
	});
});
