import { existsSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { convertForWhisper } from "../../src/audio/converter";
import {
	WhisperCliEngine,
	parseWhisperOutput,
} from "../../src/transcribe/whisper-cli";
import { TranscriptionError } from "../../src/utils/errors";
import { makeModelFile } from "../helpers";

const execaMock = vi.hoisted(() =>
	vi.fn<(file: string, args: string[]) => Promise<{ stdout: string }>>(),
);

vi.mock("execa", () => ({ execa: execaMock }));

vi.mock("../../src/audio/converter", async (importOriginal) => ({
	...(await importOriginal<typeof import("../../src/audio/converter")>()),
	convertForWhisper: vi.fn(async (wav: Buffer) => wav),
}));

describe("parseWhisperOutput", () => {
	it("should join segment lines into one transcript", () => {
		expect(parseWhisperOutput(" Hello there.\n How are you?\n")).toBe(
			"Hello there. How are you?",
		);
	});

	it("should drop non-speech markers", () => {
		expect(
			parseWhisperOutput(" [BLANK_AUDIO]\n Testing [music] one\n [Noise]\n"),
		).toBe("Testing  one");
		expect(parseWhisperOutput("[SILENCE]\n")).toBe("");
	});
});

describe("WhisperCliEngine", () => {
	let dir: string;
	let modelPath: string;
	const engine = new WhisperCliEngine({ binaryPath: "whisper-cli", threads: 4 });
	const handle = () => ({ modelPath, loadedAt: 0 });

	beforeEach(() => {
		({ dir, modelPath } = makeModelFile());
		execaMock.mockReset();
		vi.mocked(convertForWhisper).mockClear();
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	describe("load", () => {
		it("should accept a file that starts with the ggml magic", async () => {
			const loaded = await engine.load(modelPath);

			expect(loaded.modelPath).toBe(modelPath);
		});

		it("should reject files that are not ggml models", async () => {
			const bogus = join(dir, "bogus.bin");
			writeFileSync(bogus, "GGUF");

			await expect(engine.load(bogus)).rejects.toThrow(
				`${bogus} is not a ggml model file`,
			);
		});

		it("should reject files shorter than the magic", async () => {
			const short = join(dir, "short.bin");
			writeFileSync(short, Buffer.from([0x6c, 0x6d]));

			await expect(engine.load(short)).rejects.toThrow("is not a ggml model file");
		});
	});

	describe("transcribe", () => {
		it("should run whisper-cli on a 16-bit WAV and parse its output", async () => {
			let sampleRate = 0;
			execaMock.mockImplementation(async (_file, args) => {
				sampleRate = readFileSync(args[3]).readUInt32LE(24);
				return { stdout: " Hello world.\n" };
			});

			const result = await engine.transcribe(handle(), new Float32Array(160), {
				sampleRate: 16000,
				channels: 1,
				language: "en",
			});

			expect(result).toEqual({ text: "Hello world.", confidence: null });
			expect(sampleRate).toBe(16000);
			const [file, args] = execaMock.mock.calls[0];
			expect(file).toBe("whisper-cli");
			expect(args).toEqual([
				"-m",
				modelPath,
				"-f",
				args[3],
				"-t",
				"4",
				"-nt",
				"-np",
				"-l",
				"en",
			]);
			expect(args[3]).toMatch(/\.wav$/);
			expect(existsSync(args[3])).toBe(false);
			expect(convertForWhisper).not.toHaveBeenCalled();
		});

		it("should leave the language to the model when none is set", async () => {
			execaMock.mockResolvedValue({ stdout: "" });

			await engine.transcribe(handle(), new Float32Array(16), {
				sampleRate: 16000,
				channels: 1,
				language: null,
			});

			expect(execaMock.mock.calls[0][1]).not.toContain("-l");
		});

		it("should convert audio that is not 16kHz mono", async () => {
			execaMock.mockResolvedValue({ stdout: "converted" });

			await engine.transcribe(handle(), new Float32Array(960), {
				sampleRate: 48000,
				channels: 2,
				language: "en",
			});

			expect(convertForWhisper).toHaveBeenCalledTimes(1);
		});

		it("should report a missing binary", async () => {
			execaMock.mockRejectedValue(
				Object.assign(new Error("spawn whisper-cli ENOENT"), { code: "ENOENT" }),
			);

			const failure = engine.transcribe(handle(), new Float32Array(16), {
				sampleRate: 16000,
				channels: 1,
				language: "en",
			});

			await expect(failure).rejects.toBeInstanceOf(TranscriptionError);
			await expect(failure).rejects.toMatchObject({
				code: "ENGINE_MISSING",
				engine: "whisper.cpp",
			});
		});

		it("should wrap other failures and clean up the temp file", async () => {
			execaMock.mockRejectedValue(new Error("exit code 3"));

			await expect(
				engine.transcribe(handle(), new Float32Array(16), {
					sampleRate: 16000,
					channels: 1,
					language: "en",
				}),
			).rejects.toMatchObject({
				code: "TRANSCRIPTION_FAILED",
				message: "whisper.cpp failed: exit code 3",
			});
			expect(existsSync(execaMock.mock.calls[0][1][3])).toBe(false);
		});
	});
});
