import { ExtensionCodec, decode, encode } from "@msgpack/msgpack";
import { z } from "zod";
import { ProtocolError, errorMessage } from "../utils/errors";
import type {
	ClientMessage,
	DaemonMessage,
	SessionStatus,
	TranscriptionSession,
} from "./protocol";

export const FRAME_HEADER_BYTES = 4;
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024;

/**
 * MessagePack extension carrying a Float32Array as little-endian float32
 * bytes, so sample data stays compact and typed on both ends.
 */
export const SAMPLES_EXT_TYPE = 1;

const extensionCodec = new ExtensionCodec();

extensionCodec.register({
	type: SAMPLES_EXT_TYPE,
	encode: (input: unknown): Uint8Array | null => {
		if (!(input instanceof Float32Array)) {
			return null;
		}
		const bytes = new Uint8Array(input.length * 4);
		const view = new DataView(bytes.buffer);
		for (let i = 0; i < input.length; i++) {
			view.setFloat32(i * 4, input[i], true);
		}
		return bytes;
	},
	decode: (data: Uint8Array): Float32Array => {
		if (data.byteLength % 4 !== 0) {
			throw new Error(
				`Sample payload of ${data.byteLength} bytes is not a whole number of float32 values`,
			);
		}
		const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
		const samples = new Float32Array(data.byteLength / 4);
		for (let i = 0; i < samples.length; i++) {
			samples[i] = view.getFloat32(i * 4, true);
		}
		return samples;
	},
});

const sessionStatusSchema: z.ZodType<SessionStatus, z.ZodTypeDef, unknown> =
	z.discriminatedUnion("kind", [
		z.object({ kind: z.literal("recording") }),
		z.object({ kind: z.literal("processing") }),
		z.object({ kind: z.literal("completed") }),
		z.object({ kind: z.literal("failed"), reason: z.string() }),
	]);

const sessionSchema: z.ZodType<TranscriptionSession, z.ZodTypeDef, unknown> =
	z.object({
		id: z.string(),
		status: sessionStatusSchema,
		text: z.string(),
		confidence: z.number().nullable(),
		createdAt: z.number(),
	});

const audioChunkSchema = z.object({
	sessionId: z.string(),
	samples: z.instanceof(Float32Array),
	sampleRate: z.number().int().nonnegative(),
	channels: z.number().int().nonnegative(),
	timestamp: z.number(),
});

const clientMessageSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("StartRecording") }),
	z.object({ type: z.literal("StopRecording") }),
	z.object({ type: z.literal("StreamAudio"), chunk: audioChunkSchema }),
	z.object({ type: z.literal("GetStatus") }),
	z.object({ type: z.literal("ClearSession") }),
	z.object({ type: z.literal("SetSensitivity"), value: z.number() }),
	z.object({ type: z.literal("Shutdown") }),
]);

const daemonMessageSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("RecordingStarted"), sessionId: z.string() }),
	z.object({ type: z.literal("RecordingStopped") }),
	z.object({
		type: z.literal("TranscriptionUpdate"),
		sessionId: z.string(),
		partialText: z.string(),
		isFinal: z.boolean(),
	}),
	z.object({ type: z.literal("TranscriptionComplete"), session: sessionSchema }),
	z.object({ type: z.literal("Error"), message: z.string() }),
	z.object({
		type: z.literal("Status"),
		status: z.object({
			modelLoaded: z.boolean(),
			activeSessions: z.array(z.string()),
			uptimeMs: z.number().nonnegative(),
			audioDevice: z.string(),
			bufferSize: z.number().int().nonnegative(),
			vadSensitivity: z.number(),
		}),
	}),
	z.object({ type: z.literal("SessionCleared") }),
	z.object({ type: z.literal("AudioLevel"), level: z.number() }),
	z.object({ type: z.literal("VoiceActivityDetected") }),
	z.object({ type: z.literal("VoiceActivityEnded") }),
	z.object({ type: z.literal("ProcessingStarted") }),
	z.object({ type: z.literal("ProcessingComplete") }),
]);

/**
 * Serializes one message as `[u32 LE payload length][MessagePack payload]`.
 */
export function encodeFrame(message: ClientMessage | DaemonMessage): Buffer {
	const payload = encode(message, { extensionCodec });
	const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.byteLength);
	frame.writeUInt32LE(payload.byteLength, 0);
	frame.set(payload, FRAME_HEADER_BYTES);
	return frame;
}

function decodePayload<T>(
	payload: Uint8Array,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	label: string,
): T {
	let raw: unknown;
	try {
		raw = decode(payload, { extensionCodec });
	} catch (error) {
		throw new ProtocolError(
			"FRAME_MALFORMED",
			`Malformed ${label}: ${errorMessage(error)}`,
			{ payloadBytes: payload.byteLength },
		);
	}

	const result = schema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ProtocolError("FRAME_MALFORMED", `Malformed ${label}: ${issues}`, {
			payloadBytes: payload.byteLength,
		});
	}
	return result.data;
}

export const decodeClientMessage = (payload: Uint8Array): ClientMessage =>
	decodePayload(payload, clientMessageSchema, "client message");

export const decodeDaemonMessage = (payload: Uint8Array): DaemonMessage =>
	decodePayload(payload, daemonMessageSchema, "daemon message");

/**
 * Decodes a single frame held entirely in memory.
 * @throws {ProtocolError} FRAME_TRUNCATED when the bytes stop short of the
 * declared length, FRAME_MALFORMED when the payload does not decode
 */
export function decodeFrame<T>(
	frame: Uint8Array,
	decodeMessage: (payload: Uint8Array) => T,
): T {
	if (frame.byteLength < FRAME_HEADER_BYTES) {
		throw new ProtocolError(
			"FRAME_TRUNCATED",
			`Frame header truncated: ${frame.byteLength} of ${FRAME_HEADER_BYTES} bytes`,
		);
	}
	const view = new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
	const length = view.getUint32(0, true);
	const available = frame.byteLength - FRAME_HEADER_BYTES;
	if (available < length) {
		throw new ProtocolError(
			"FRAME_TRUNCATED",
			`Frame payload truncated: ${available} of ${length} bytes`,
		);
	}
	return decodeMessage(
		frame.subarray(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + length),
	);
}

/**
 * Pulls length-prefixed frames off a byte stream such as a socket.
 */
export class FrameReader {
	private readonly chunks: AsyncIterator<Uint8Array>;
	private pending: Buffer[] = [];
	private pendingBytes = 0;
	private ended = false;

	constructor(
		source: AsyncIterable<Uint8Array>,
		private readonly maxFrameBytes = DEFAULT_MAX_FRAME_BYTES,
	) {
		this.chunks = source[Symbol.asyncIterator]();
	}

	/**
	 * Resolves with the next payload, or null when the stream ends cleanly
	 * between frames.
	 * @throws {ProtocolError} FRAME_TRUNCATED, FRAME_TOO_LARGE
	 */
	async readFrame(): Promise<Buffer | null> {
		if (!(await this.fill(FRAME_HEADER_BYTES))) {
			if (this.pendingBytes === 0) {
				return null;
			}
			throw new ProtocolError(
				"FRAME_TRUNCATED",
				`Stream closed after ${this.pendingBytes} of ${FRAME_HEADER_BYTES} header bytes`,
			);
		}

		const length = this.take(FRAME_HEADER_BYTES).readUInt32LE(0);
		if (length > this.maxFrameBytes) {
			throw new ProtocolError(
				"FRAME_TOO_LARGE",
				`Frame of ${length} bytes exceeds the ${this.maxFrameBytes} byte limit`,
				{ length, maxFrameBytes: this.maxFrameBytes },
			);
		}

		if (!(await this.fill(length))) {
			throw new ProtocolError(
				"FRAME_TRUNCATED",
				`Stream closed after ${this.pendingBytes} of ${length} payload bytes`,
				{ length },
			);
		}
		return this.take(length);
	}

	async readMessage<T>(
		decodeMessage: (payload: Uint8Array) => T,
	): Promise<T | null> {
		const payload = await this.readFrame();
		return payload === null ? null : decodeMessage(payload);
	}

	async close(): Promise<void> {
		this.ended = true;
		await this.chunks.return?.();
	}

	private async fill(size: number): Promise<boolean> {
		while (this.pendingBytes < size) {
			if (this.ended) {
				return false;
			}
			const next = await this.chunks.next();
			if (next.done) {
				this.ended = true;
				return false;
			}
			const chunk = Buffer.from(
				next.value.buffer,
				next.value.byteOffset,
				next.value.byteLength,
			);
			this.pending.push(chunk);
			this.pendingBytes += chunk.byteLength;
		}
		return true;
	}

	private take(size: number): Buffer {
		const all =
			this.pending.length === 1
				? this.pending[0]
				: Buffer.concat(this.pending, this.pendingBytes);
		const rest = all.subarray(size);
		this.pending = rest.byteLength > 0 ? [rest] : [];
		this.pendingBytes = rest.byteLength;
		return all.subarray(0, size);
	}
}
