import { AppError } from "../utils/errors";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";

export interface AudioFormat {
	sampleRate: number;
	channels: number;
}

export interface DecodedWav extends AudioFormat {
	/** Interleaved samples in [-1, 1]. */
	samples: Float32Array;
}

const RIFF_HEADER_BYTES = 44;
const FORMAT_PCM = 1;
const FORMAT_IEEE_FLOAT = 3;

/**
 * Encodes float samples as a 16-bit PCM WAV file, the input format
 * whisper.cpp reads.
 */
export function encodeWav(samples: Float32Array, format: AudioFormat): Buffer {
	const dataBytes = samples.length * 2;
	const buffer = Buffer.alloc(RIFF_HEADER_BYTES + dataBytes);

	buffer.write("RIFF", 0, "ascii");
	buffer.writeUInt32LE(36 + dataBytes, 4);
	buffer.write("WAVE", 8, "ascii");
	buffer.write("fmt ", 12, "ascii");
	buffer.writeUInt32LE(16, 16);
	buffer.writeUInt16LE(FORMAT_PCM, 20);
	buffer.writeUInt16LE(format.channels, 22);
	buffer.writeUInt32LE(format.sampleRate, 24);
	buffer.writeUInt32LE(format.sampleRate * format.channels * 2, 28);
	buffer.writeUInt16LE(format.channels * 2, 32);
	buffer.writeUInt16LE(16, 34);
	buffer.write("data", 36, "ascii");
	buffer.writeUInt32LE(dataBytes, 40);

	for (let i = 0; i < samples.length; i++) {
		const clamped = Math.max(-1, Math.min(1, samples[i]));
		const value = clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff;
		buffer.writeInt16LE(Math.round(value), RIFF_HEADER_BYTES + i * 2);
	}

	return buffer;
}

const invalid = (reason: string) =>
	new AppError(
		"INVALID_AUDIO_FILE",
		formatUserError(ErrorTemplates.AUDIO.INVALID_WAV(reason)),
	);

/**
 * Reads a 16-bit PCM or 32-bit float WAV file. Chunks other than `fmt ` and
 * `data` are skipped.
 * @throws {AppError} INVALID_AUDIO_FILE
 */
export function decodeWav(file: Buffer): DecodedWav {
	if (
		file.length < 12 ||
		file.toString("ascii", 0, 4) !== "RIFF" ||
		file.toString("ascii", 8, 12) !== "WAVE"
	) {
		throw invalid("not a RIFF/WAVE file");
	}

	let format: (AudioFormat & { code: number; bitsPerSample: number }) | null =
		null;
	let offset = 12;

	while (offset + 8 <= file.length) {
		const id = file.toString("ascii", offset, offset + 4);
		const size = file.readUInt32LE(offset + 4);
		const body = offset + 8;

		if (id === "fmt ") {
			format = {
				code: file.readUInt16LE(body),
				channels: file.readUInt16LE(body + 2),
				sampleRate: file.readUInt32LE(body + 4),
				bitsPerSample: file.readUInt16LE(body + 14),
			};
			if (format.channels < 1 || format.sampleRate < 1) {
				throw invalid(
					`${format.channels} channels at ${format.sampleRate} Hz`,
				);
			}
		} else if (id === "data") {
			if (!format) {
				throw invalid("data chunk before fmt chunk");
			}
			const end = Math.min(body + size, file.length);
			return {
				sampleRate: format.sampleRate,
				channels: format.channels,
				samples: readSamples(file.subarray(body, end), format),
			};
		}

		// Chunks are word-aligned
		offset = body + size + (size % 2);
	}

	throw invalid("no data chunk");
}

function readSamples(
	data: Buffer,
	format: { code: number; bitsPerSample: number },
): Float32Array {
	if (format.code === FORMAT_PCM && format.bitsPerSample === 16) {
		const samples = new Float32Array(Math.floor(data.length / 2));
		for (let i = 0; i < samples.length; i++) {
			samples[i] = data.readInt16LE(i * 2) / 0x8000;
		}
		return samples;
	}
	if (format.code === FORMAT_IEEE_FLOAT && format.bitsPerSample === 32) {
		const samples = new Float32Array(Math.floor(data.length / 4));
		for (let i = 0; i < samples.length; i++) {
			samples[i] = data.readFloatLE(i * 4);
		}
		return samples;
	}
	throw invalid(
		`format ${format.code} with ${format.bitsPerSample} bits per sample`,
	);
}
