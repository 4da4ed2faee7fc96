import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SessionRegistry } from "../../src/daemon/session-registry";
import { logger } from "../../src/utils/logger";
import { SESSION_ID, chunkOf } from "../helpers";

describe("SessionRegistry", () => {
	let registry: SessionRegistry;

	beforeEach(() => {
		registry = new SessionRegistry();
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("creates recording sessions with distinct ids", async () => {
		const first = await registry.create();
		const second = await registry.create();

		expect(first).not.toBe(second);
		expect(await registry.listIds()).toEqual([first, second]);
		expect(await registry.get(first)).toMatchObject({
			id: first,
			status: { kind: "recording" },
			text: "",
			confidence: null,
		});
	});

	it("hands out copies that do not alias the stored session", async () => {
		const id = await registry.create();
		const copy = await registry.get(id);
		if (!copy) throw new Error("session missing");

		copy.text = "changed";
		copy.status = { kind: "completed" };

		expect(await registry.get(id)).toMatchObject({
			text: "",
			status: { kind: "recording" },
		});
	});

	it("returns null for unknown sessions", async () => {
		expect(await registry.exists(SESSION_ID)).toBe(false);
		expect(await registry.get(SESSION_ID)).toBeNull();
		expect(await registry.durationOf(SESSION_ID)).toBeNull();
		expect(await registry.update(SESSION_ID, () => {})).toBeNull();
		expect(await registry.remove(SESSION_ID)).toBe(false);
	});

	it("applies updates under the lock and returns the result", async () => {
		const id = await registry.create();

		const updated = await registry.update(id, (session) => {
			session.text = "done";
			session.status = { kind: "completed" };
		});

		expect(updated).toMatchObject({ text: "done", status: { kind: "completed" } });
		expect(await registry.get(id)).toEqual(updated);
	});

	it("appends audio to the session's buffer", async () => {
		const id = await registry.create();

		const result = await registry.appendAudio(
			chunkOf(new Float32Array(8000).fill(0.5), id),
			0.1,
		);

		expect(result).toEqual({
			level: 0.5,
			transition: "started",
			durationSeconds: 0.5,
		});
		expect(await registry.durationOf(id)).toBe(0.5);
		expect(await registry.bufferedSamples()).toBe(8000);
	});

	it("should give new buffers the chunk format it was built with", async () => {
		const warn = vi.spyOn(logger, "warn");
		const stereo = new SessionRegistry({ sampleRate: 22050, channels: 2 });
		const id = await stereo.create();

		const result = await stereo.appendAudio(
			chunkOf(new Float32Array(22050), id, 22050, 2),
			0.1,
		);

		expect(result.durationSeconds).toBe(0.5);
		expect(warn).not.toHaveBeenCalled();
	});

	it("rejects audio for an unknown session without creating one", async () => {
		await expect(
			registry.appendAudio(chunkOf(new Float32Array(16)), 0.1),
		).rejects.toMatchObject({
			code: "SESSION_NOT_FOUND",
			message: "session not found",
		});
		expect(await registry.listIds()).toEqual([]);
		expect(await registry.bufferedSamples()).toBe(0);
	});

	it("rejects audio for a session that is no longer recording", async () => {
		const id = await registry.create();
		await registry.update(id, (session) => {
			session.status = { kind: "processing" };
		});

		await expect(
			registry.appendAudio(chunkOf(new Float32Array(16), id), 0.1),
		).rejects.toMatchObject({
			code: "SESSION_NOT_RECORDING",
			message: "session is not recording",
		});
	});

	it("finalizes recording sessions and drains their audio", async () => {
		const withAudio = await registry.create();
		const silent = await registry.create();
		await registry.appendAudio(chunkOf(new Float32Array(16000), withAudio), 0.1);

		const { audio, sessionIds } = await registry.finalizeRecording();

		expect(sessionIds).toEqual([withAudio, silent]);
		expect(audio).toHaveLength(1);
		expect(audio[0]).toMatchObject({
			sessionId: withAudio,
			sampleRate: 16000,
			channels: 1,
			durationSeconds: 1,
		});
		expect(audio[0].samples.length).toBe(16000);
		expect(await registry.get(withAudio)).toMatchObject({
			status: { kind: "processing" },
		});
		expect(await registry.bufferedSamples()).toBe(0);
	});

	it("leaves sessions that are already processing to their own stop", async () => {
		const first = await registry.create();
		await registry.finalizeRecording();
		const second = await registry.create();

		const { sessionIds } = await registry.finalizeRecording();

		expect(sessionIds).toEqual([second]);
		expect(await registry.exists(first)).toBe(true);
	});

	it("clears every session and reports how many it dropped", async () => {
		await registry.create();
		await registry.create();

		expect(await registry.clear()).toBe(2);
		expect(await registry.listIds()).toEqual([]);
		expect(await registry.clear()).toBe(0);
	});
});
