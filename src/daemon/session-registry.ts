import { randomUUID } from "node:crypto";
import type { AudioFormat } from "../audio/wav";
import type {
	AudioChunk,
	SessionId,
	TranscriptionSession,
} from "../shared/protocol";
import { AppError } from "../utils/errors";
import { RwLock } from "../utils/rw-lock";
import {
	AudioBuffer,
	DEFAULT_CHUNK_FORMAT,
	type VoiceTransition,
} from "./audio-buffer";

interface SessionEntry {
	session: TranscriptionSession;
	buffer: AudioBuffer;
}

export interface AppendResult {
	level: number;
	transition: VoiceTransition;
	durationSeconds: number;
}

/**
 * Audio taken from a session when its recording is finalized.
 */
export interface FinalizedAudio {
	sessionId: SessionId;
	samples: Float32Array;
	sampleRate: number;
	channels: number;
	durationSeconds: number;
}

/**
 * Owns every live session together with its audio buffer. Callers only ever
 * see copies of a session; all changes go through the registry's lock.
 */
export class SessionRegistry {
	private readonly entries = new RwLock(new Map<SessionId, SessionEntry>());

	/**
	 * @param chunkFormat Format new session buffers expect from capture.
	 */
	constructor(private readonly chunkFormat: AudioFormat = DEFAULT_CHUNK_FORMAT) {}

	async create(): Promise<SessionId> {
		const session: TranscriptionSession = {
			id: randomUUID(),
			status: { kind: "recording" },
			text: "",
			confidence: null,
			createdAt: Date.now(),
		};
		await this.entries.write((entries) => {
			entries.set(session.id, {
				session,
				buffer: new AudioBuffer(session.id, this.chunkFormat),
			});
		});
		return session.id;
	}

	exists(id: SessionId): Promise<boolean> {
		return this.entries.read((entries) => entries.has(id));
	}

	get(id: SessionId): Promise<TranscriptionSession | null> {
		return this.entries.read((entries) => {
			const entry = entries.get(id);
			return entry ? structuredClone(entry.session) : null;
		});
	}

	/**
	 * Applies `fn` to the stored session and returns a copy of the result,
	 * or null when the id is unknown.
	 */
	update(
		id: SessionId,
		fn: (session: TranscriptionSession) => void,
	): Promise<TranscriptionSession | null> {
		return this.entries.write((entries) => {
			const entry = entries.get(id);
			if (!entry) {
				return null;
			}
			fn(entry.session);
			return structuredClone(entry.session);
		});
	}

	remove(id: SessionId): Promise<boolean> {
		return this.entries.write((entries) => entries.delete(id));
	}

	listIds(): Promise<SessionId[]> {
		return this.entries.read((entries) => [...entries.keys()]);
	}

	durationOf(id: SessionId): Promise<number | null> {
		return this.entries.read(
			(entries) => entries.get(id)?.buffer.durationSeconds() ?? null,
		);
	}

	bufferedSamples(): Promise<number> {
		return this.entries.read((entries) => {
			let total = 0;
			for (const { buffer } of entries.values()) {
				total += buffer.sampleCount;
			}
			return total;
		});
	}

	/**
	 * @throws {AppError} SESSION_NOT_FOUND, SESSION_NOT_RECORDING
	 */
	appendAudio(chunk: AudioChunk, vadThreshold: number): Promise<AppendResult> {
		return this.entries.write((entries) => {
			const entry = entries.get(chunk.sessionId);
			if (!entry) {
				throw new AppError("SESSION_NOT_FOUND", "session not found", {
					sessionId: chunk.sessionId,
				});
			}
			if (entry.session.status.kind !== "recording") {
				throw new AppError(
					"SESSION_NOT_RECORDING",
					"session is not recording",
					{ sessionId: chunk.sessionId, status: entry.session.status.kind },
				);
			}
			const transition = entry.buffer.append(chunk, vadThreshold);
			return {
				level: entry.buffer.level,
				transition,
				durationSeconds: entry.buffer.durationSeconds(),
			};
		});
	}

	/**
	 * Moves every recording session to `processing` and drains its buffer.
	 * Sessions already being processed by another stop are left alone.
	 */
	finalizeRecording(): Promise<{
		audio: FinalizedAudio[];
		sessionIds: SessionId[];
	}> {
		return this.entries.write((entries) => {
			const audio: FinalizedAudio[] = [];
			const sessionIds: SessionId[] = [];
			for (const [id, { session, buffer }] of entries) {
				if (session.status.kind !== "recording") {
					continue;
				}
				session.status = { kind: "processing" };
				sessionIds.push(id);

				const durationSeconds = buffer.durationSeconds();
				const samples = buffer.drain();
				if (samples.length > 0) {
					audio.push({
						sessionId: id,
						samples,
						sampleRate: buffer.sampleRate,
						channels: buffer.channels,
						durationSeconds,
					});
				}
			}
			return { audio, sessionIds };
		});
	}

	/**
	 * Drops every session and buffer; returns how many there were.
	 */
	clear(): Promise<number> {
		return this.entries.write((entries) => {
			const count = entries.size;
			entries.clear();
			return count;
		});
	}
}
