import { describe, expect, it } from "vitest";
import { decodeWav, encodeWav } from "../../src/audio/wav";
import { thrownBy } from "../helpers";

const chunk = (id: string, body: Buffer) => {
	const header = Buffer.alloc(8);
	header.write(id, 0, "ascii");
	header.writeUInt32LE(body.length, 4);
	return Buffer.concat([header, body, body.length % 2 ? Buffer.alloc(1) : Buffer.alloc(0)]);
};

const fmtChunk = (code: number, channels: number, sampleRate: number, bits: number) => {
	const body = Buffer.alloc(16);
	body.writeUInt16LE(code, 0);
	body.writeUInt16LE(channels, 2);
	body.writeUInt32LE(sampleRate, 4);
	body.writeUInt32LE((sampleRate * channels * bits) / 8, 8);
	body.writeUInt16LE((channels * bits) / 8, 12);
	body.writeUInt16LE(bits, 14);
	return chunk("fmt ", body);
};

const riff = (...chunks: Buffer[]) => {
	const body = Buffer.concat(chunks);
	const header = Buffer.alloc(12);
	header.write("RIFF", 0, "ascii");
	header.writeUInt32LE(4 + body.length, 4);
	header.write("WAVE", 8, "ascii");
	return Buffer.concat([header, body]);
};

describe("encodeWav", () => {
	it("should write a 16-bit PCM header for the given format", () => {
		const wav = encodeWav(new Float32Array(4), { sampleRate: 16000, channels: 1 });

		expect(wav.length).toBe(44 + 8);
		expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
		expect(wav.readUInt32LE(4)).toBe(36 + 8);
		expect(wav.toString("ascii", 8, 16)).toBe("WAVEfmt ");
		expect(wav.readUInt16LE(20)).toBe(1);
		expect(wav.readUInt16LE(22)).toBe(1);
		expect(wav.readUInt32LE(24)).toBe(16000);
		expect(wav.readUInt32LE(28)).toBe(32000);
		expect(wav.readUInt16LE(32)).toBe(2);
		expect(wav.readUInt16LE(34)).toBe(16);
		expect(wav.toString("ascii", 36, 40)).toBe("data");
		expect(wav.readUInt32LE(40)).toBe(8);
	});

	it("should scale and clamp samples to 16-bit range", () => {
		const wav = encodeWav(new Float32Array([0, 0.5, -0.5, 1, -1, 2, -2]), {
			sampleRate: 16000,
			channels: 1,
		});

		const values = Array.from({ length: 7 }, (_, i) => wav.readInt16LE(44 + i * 2));
		expect(values).toEqual([0, 16384, -16384, 32767, -32768, 32767, -32768]);
	});
});

describe("decodeWav", () => {
	it("should read back what encodeWav wrote", () => {
		const wav = encodeWav(new Float32Array([0, 0.5, -0.5, 0.25, -1]), {
			sampleRate: 48000,
			channels: 2,
		});

		const decoded = decodeWav(wav);

		expect(decoded.sampleRate).toBe(48000);
		expect(decoded.channels).toBe(2);
		expect(Array.from(decoded.samples)).toEqual([0, 0.5, -0.5, 0.25, -1]);
	});

	it("should read 32-bit float data", () => {
		const data = Buffer.alloc(8);
		data.writeFloatLE(0.75, 0);
		data.writeFloatLE(-0.125, 4);

		const decoded = decodeWav(riff(fmtChunk(3, 1, 22050, 32), chunk("data", data)));

		expect(decoded.sampleRate).toBe(22050);
		expect(Array.from(decoded.samples)).toEqual([0.75, -0.125]);
	});

	it("should skip chunks it does not know, including odd-sized ones", () => {
		const data = Buffer.alloc(2);
		data.writeInt16LE(-16384, 0);

		const decoded = decodeWav(
			riff(
				fmtChunk(1, 1, 16000, 16),
				chunk("LIST", Buffer.from("abc")),
				chunk("data", data),
			),
		);

		expect(Array.from(decoded.samples)).toEqual([-0.5]);
	});

	it("should reject files that are not RIFF/WAVE", () => {
		expect(thrownBy(() => decodeWav(Buffer.from("not a wav file")))).toMatchObject({
			code: "INVALID_AUDIO_FILE",
		});
	});

	it("should reject a data chunk without a format", () => {
		expect(
			thrownBy(() => decodeWav(riff(chunk("data", Buffer.alloc(4))))),
		).toMatchObject({ code: "INVALID_AUDIO_FILE" });
	});

	it("should reject files without audio data", () => {
		expect(
			thrownBy(() => decodeWav(riff(fmtChunk(1, 1, 16000, 16)))),
		).toMatchObject({ code: "INVALID_AUDIO_FILE" });
	});

	it.each([
		[0, 16000, "0 channels at 16000 Hz"],
		[1, 0, "1 channels at 0 Hz"],
	])(
		"should reject a format chunk with %i channels at %i Hz",
		(channels, sampleRate, reason) => {
			const error = thrownBy(() =>
				decodeWav(
					riff(fmtChunk(1, channels, sampleRate, 16), chunk("data", Buffer.alloc(20))),
				),
			);

			expect(error).toMatchObject({ code: "INVALID_AUDIO_FILE" });
			expect(error).toHaveProperty("message", expect.stringContaining(reason));
		},
	);

	it("should reject sample formats it cannot read", () => {
		const error = thrownBy(() =>
			decodeWav(riff(fmtChunk(1, 1, 16000, 24), chunk("data", Buffer.alloc(6)))),
		);

		expect(error).toMatchObject({ code: "INVALID_AUDIO_FILE" });
		expect(error).toHaveProperty(
			"message",
			expect.stringContaining("format 1 with 24 bits per sample"),
		);
	});
});
