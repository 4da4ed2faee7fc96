import { randomUUID } from "node:crypto";
import { open, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { execa } from "execa";
import { convertForWhisper, needsConversion } from "../audio/converter";
import { encodeWav } from "../audio/wav";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import {
	AppError,
	TranscriptionError,
	errorMessage,
	isErrnoException,
} from "../utils/errors";
import { logger } from "../utils/logger";
import type {
	EngineTranscript,
	ModelHandle,
	SpeechEngine,
	TranscribeOptions,
} from "./engine";

const ENGINE_NAME = "whisper.cpp";

/** "ggml" as a little-endian u32, the first word of every whisper.cpp model. */
export const GGML_MAGIC = 0x67676d6c;

const NON_SPEECH_MARKERS = /\[(BLANK_AUDIO|MUSIC|NOISE|SILENCE)\]/gi;

export interface WhisperCliOptions {
	binaryPath: string;
	threads: number;
}

/**
 * Joins whisper-cli's segment lines into one transcript and drops the
 * markers it prints for non-speech audio.
 */
export const parseWhisperOutput = (stdout: string): string =>
	stdout
		.split("\n")
		.map((line) => line.replace(NON_SPEECH_MARKERS, "").trim())
		.filter((line) => line.length > 0)
		.join(" ");

/**
 * Runs inference through the whisper.cpp command line tool. Each
 * transcription is a child process, so the daemon's event loop stays free
 * while the model works.
 */
export class WhisperCliEngine implements SpeechEngine {
	readonly name = ENGINE_NAME;

	constructor(private readonly options: WhisperCliOptions) {}

	async load(modelPath: string): Promise<ModelHandle> {
		const header = Buffer.alloc(4);
		const file = await open(modelPath, "r");
		const { bytesRead } = await file
			.read(header, 0, header.length, 0)
			.finally(() => file.close());

		if (bytesRead < header.length || header.readUInt32LE(0) !== GGML_MAGIC) {
			throw new Error(`${modelPath} is not a ggml model file`);
		}

		logger.debug({ modelPath }, "Validated whisper.cpp model file");
		return { modelPath, loadedAt: Date.now() };
	}

	async unload(handle: ModelHandle): Promise<void> {
		// The CLI loads the model per run; there is no resident state to free.
		logger.debug({ modelPath: handle.modelPath }, "Released whisper.cpp model");
	}

	async transcribe(
		handle: ModelHandle,
		samples: Float32Array,
		options: TranscribeOptions,
	): Promise<EngineTranscript> {
		const wavPath = join(tmpdir(), `dictation-${randomUUID()}.wav`);

		try {
			let wav = encodeWav(samples, options);
			if (needsConversion(options)) {
				wav = await convertForWhisper(wav);
			}
			await writeFile(wavPath, wav, { mode: 0o600 });

			const args = [
				"-m",
				handle.modelPath,
				"-f",
				wavPath,
				"-t",
				String(this.options.threads),
				"-nt",
				"-np",
			];
			if (options.language) {
				args.push("-l", options.language);
			}

			const { stdout } = await execa(this.options.binaryPath, args);
			return { text: parseWhisperOutput(stdout), confidence: null };
		} catch (error) {
			if (error instanceof AppError) {
				throw error;
			}
			if (isErrnoException(error) && error.code === "ENOENT") {
				throw new TranscriptionError(
					ENGINE_NAME,
					"ENGINE_MISSING",
					formatUserError(
						ErrorTemplates.MODEL.ENGINE_MISSING(this.options.binaryPath),
					),
				);
			}
			throw new TranscriptionError(
				ENGINE_NAME,
				"TRANSCRIPTION_FAILED",
				`${ENGINE_NAME} failed: ${errorMessage(error)}`,
			);
		} finally {
			await rm(wavPath, { force: true });
		}
	}
}
