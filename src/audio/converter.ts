import { randomUUID } from "node:crypto";
import { readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { execa } from "execa";
import { AppError, errorMessage, isErrnoException } from "../utils/errors";
import { logError } from "../utils/logger";
import type { AudioFormat } from "./wav";

export const WHISPER_FORMAT: AudioFormat = { sampleRate: 16000, channels: 1 };

export const needsConversion = (format: AudioFormat): boolean =>
	format.sampleRate !== WHISPER_FORMAT.sampleRate ||
	format.channels !== WHISPER_FORMAT.channels;

/**
 * Resamples and downmixes a WAV file to what whisper.cpp expects:
 * 16kHz, mono, 16-bit PCM.
 */
export async function convertForWhisper(wav: Buffer): Promise<Buffer> {
	const tempId = randomUUID();
	const inputPath = join(tmpdir(), `dictation-input-${tempId}.wav`);
	const outputPath = join(tmpdir(), `dictation-output-${tempId}.wav`);

	try {
		await writeFile(inputPath, wav);

		try {
			await execa("ffmpeg", [
				"-y",
				"-loglevel",
				"error",
				"-i",
				inputPath,
				"-ar",
				String(WHISPER_FORMAT.sampleRate),
				"-ac",
				String(WHISPER_FORMAT.channels),
				"-c:a",
				"pcm_s16le",
				outputPath,
			]);
		} catch (ffmpegError) {
			if (isErrnoException(ffmpegError) && ffmpegError.code === "ENOENT") {
				throw new AppError("ENGINE_MISSING", "FFmpeg is not installed");
			}
			throw new AppError(
				"TRANSCRIPTION_FAILED",
				`FFmpeg conversion failed: ${errorMessage(ffmpegError)}`,
			);
		}

		return await readFile(outputPath);
	} catch (error) {
		if (!(error instanceof AppError)) {
			logError("Audio conversion failed", error);
		}
		throw error;
	} finally {
		await Promise.all([
			rm(inputPath, { force: true }),
			rm(outputPath, { force: true }),
		]);
	}
}
