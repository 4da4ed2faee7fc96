import { VoiceActivityDetector, calculateAmplitude } from "../audio/amplitude";
import type { AudioFormat } from "../audio/wav";
import type { AudioChunk } from "../shared/protocol";
import { AppError } from "../utils/errors";
import { logger } from "../utils/logger";

export const DEFAULT_CHUNK_FORMAT: AudioFormat = { sampleRate: 16000, channels: 1 };
const INITIAL_CAPACITY = DEFAULT_CHUNK_FORMAT.sampleRate * 4;

export type VoiceTransition = "started" | "ended" | null;

/**
 * Per-session accumulator of captured samples.
 */
export class AudioBuffer {
	private data = new Float32Array(INITIAL_CAPACITY);
	private length = 0;
	private drained = false;
	private _sampleRate: number;
	private _channels: number;
	private _lastChunkAt = Date.now();
	private _level = 0;
	private readonly vad = new VoiceActivityDetector();

	/**
	 * @param format The chunk format the buffer expects until a chunk says
	 * otherwise.
	 */
	constructor(
		private readonly sessionId: string,
		format: AudioFormat = DEFAULT_CHUNK_FORMAT,
	) {
		this._sampleRate = format.sampleRate;
		this._channels = format.channels;
	}

	get sampleCount(): number {
		return this.length;
	}

	get sampleRate(): number {
		return this._sampleRate;
	}

	get channels(): number {
		return this._channels;
	}

	/** Capture timestamp of the last chunk, epoch ms. */
	get lastChunkAt(): number {
		return this._lastChunkAt;
	}

	/** RMS of the most recent chunk. */
	get level(): number {
		return this._level;
	}

	get isDrained(): boolean {
		return this.drained;
	}

	/**
	 * Appends the chunk's samples. Format is last-writer-wins: the buffer
	 * takes the chunk's sample rate, channel count and timestamp.
	 */
	append(chunk: AudioChunk, vadThreshold?: number): VoiceTransition {
		if (this.drained) {
			throw new AppError(
				"AUDIO_BUFFER_DRAINED",
				"audio buffer was already drained",
				{ sessionId: this.sessionId },
			);
		}

		if (
			chunk.sampleRate !== this._sampleRate ||
			chunk.channels !== this._channels
		) {
			logger.warn(
				{
					sessionId: this.sessionId,
					from: { sampleRate: this._sampleRate, channels: this._channels },
					to: { sampleRate: chunk.sampleRate, channels: chunk.channels },
				},
				"Audio chunk format differs from the buffer's format",
			);
		}

		this.reserve(this.length + chunk.samples.length);
		this.data.set(chunk.samples, this.length);
		this.length += chunk.samples.length;
		this._sampleRate = chunk.sampleRate;
		this._channels = chunk.channels;
		this._lastChunkAt = chunk.timestamp;
		this._level = calculateAmplitude(chunk.samples);

		return vadThreshold === undefined
			? null
			: this.vad.update(chunk.samples, vadThreshold);
	}

	durationSeconds(): number {
		if (this._sampleRate === 0 || this._channels === 0) {
			return 0;
		}
		return this.length / (this._sampleRate * this._channels);
	}

	/**
	 * True once more than `timeoutSeconds` of wall-clock time has passed since
	 * the last chunk was captured.
	 */
	isIdle(timeoutSeconds: number): boolean {
		return Date.now() - this._lastChunkAt > timeoutSeconds * 1000;
	}

	/**
	 * Hands over every buffered sample. A buffer drains once; it accepts
	 * nothing afterwards.
	 */
	drain(): Float32Array {
		if (this.drained) {
			throw new AppError(
				"AUDIO_BUFFER_DRAINED",
				"audio buffer was already drained",
				{ sessionId: this.sessionId },
			);
		}
		const samples = this.data.slice(0, this.length);
		this.drained = true;
		this.data = new Float32Array(0);
		this.length = 0;
		this.vad.reset();
		return samples;
	}

	private reserve(capacity: number): void {
		if (capacity <= this.data.length) {
			return;
		}
		let next = Math.max(this.data.length, INITIAL_CAPACITY);
		while (next < capacity) {
			next *= 2;
		}
		const grown = new Float32Array(next);
		grown.set(this.data.subarray(0, this.length));
		this.data = grown;
	}
}
