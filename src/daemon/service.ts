import { EventEmitter } from "node:events";
import type {
	AudioChunk,
	ClientMessage,
	DaemonNotification,
	DaemonResponse,
	TranscriptionSession,
} from "../shared/protocol";
import { AppError, errorMessage } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import type { ModelManager } from "./model-manager";
import type { SessionRegistry } from "./session-registry";

export type Notify = (message: DaemonNotification) => void;

export interface DaemonServiceOptions {
	/** Capture device name reported in status snapshots. */
	audioDevice: string;
	vadSensitivity: number;
	idleCheckIntervalSeconds: number;
}

const noop: Notify = () => {};

/**
 * Routes client messages to the session registry and the model manager.
 *
 * Emits `shutdown` when a client asks the daemon to exit; whoever runs the
 * daemon decides how to terminate the process.
 */
export class DaemonService extends EventEmitter {
	private readonly startTime = Date.now();
	private vadSensitivity: number;

	constructor(
		private readonly sessions: SessionRegistry,
		private readonly model: ModelManager,
		private readonly options: DaemonServiceOptions,
	) {
		super();
		this.vadSensitivity = options.vadSensitivity;
	}

	start(): void {
		this.model.startIdleMonitor(this.options.idleCheckIntervalSeconds);
		logger.info(
			{ idleCheckIntervalSeconds: this.options.idleCheckIntervalSeconds },
			"Daemon service started",
		);
	}

	async stop(): Promise<void> {
		this.model.stopIdleMonitor();
		await this.model.unload();
		logger.info("Daemon service stopped");
	}

	/**
	 * Handles one client message. Notifications for the same connection go
	 * through `notify` before the response is returned. Resolves with null
	 * when the message gets no response.
	 */
	async handleMessage(
		message: ClientMessage,
		notify: Notify = noop,
	): Promise<DaemonResponse | null> {
		logger.debug({ type: message.type }, "Handling client message");

		try {
			switch (message.type) {
				case "StartRecording":
					return await this.startRecording();
				case "StopRecording":
					return await this.stopRecording(notify);
				case "StreamAudio":
					return await this.streamAudio(message.chunk, notify);
				case "GetStatus":
					return await this.getStatus();
				case "ClearSession":
					return await this.clearSessions();
				case "SetSensitivity":
					return await this.setSensitivity(message.value);
				case "Shutdown":
					logger.info("Received shutdown command");
					this.emit("shutdown");
					return null;
				default: {
					const unhandled: never = message;
					throw new AppError("UNKNOWN_ERROR", "unhandled message", {
						message: unhandled,
					});
				}
			}
		} catch (error) {
			if (error instanceof AppError) {
				logger.warn(
					{ code: error.code, type: message.type, ...error.context },
					error.message,
				);
			} else {
				logError("Unexpected error while handling message", error, {
					type: message.type,
				});
			}
			return { type: "Error", message: errorMessage(error) };
		}
	}

	private async startRecording(): Promise<DaemonResponse> {
		// The session is registered only after the load, where a concurrent
		// stop or clear can no longer drop it unseen.
		await this.model.ensureLoaded();
		const sessionId = await this.sessions.create();

		logger.info({ sessionId }, "Recording started");
		return { type: "RecordingStarted", sessionId };
	}

	private async streamAudio(
		chunk: AudioChunk,
		notify: Notify,
	): Promise<DaemonResponse> {
		const result = await this.sessions.appendAudio(chunk, this.vadSensitivity);

		notify({ type: "AudioLevel", level: result.level });
		if (result.transition === "started") {
			notify({ type: "VoiceActivityDetected" });
		} else if (result.transition === "ended") {
			notify({ type: "VoiceActivityEnded" });
		}

		logger.debug(
			{
				sessionId: chunk.sessionId,
				samples: chunk.samples.length,
				bufferedSeconds: result.durationSeconds,
			},
			"Buffered audio chunk",
		);

		// No inference while streaming; this only acknowledges the chunk.
		return {
			type: "TranscriptionUpdate",
			sessionId: chunk.sessionId,
			partialText: "",
			isFinal: false,
		};
	}

	private async stopRecording(notify: Notify): Promise<DaemonResponse> {
		const { audio, sessionIds } = await this.sessions.finalizeRecording();
		logger.info(
			{ sessions: sessionIds.length, withAudio: audio.length },
			"Stopping recording sessions",
		);

		const results: TranscriptionSession[] = [];

		for (const item of audio) {
			logger.info(
				{ sessionId: item.sessionId, durationSeconds: item.durationSeconds },
				"Processing final audio",
			);
			notify({ type: "ProcessingStarted" });

			let apply: (session: TranscriptionSession) => void;
			try {
				// The model may have idled out during a long recording.
				await this.model.ensureLoaded();
				const transcript = await this.model.transcribe(item.samples, item);
				apply = (session) => {
					session.status = { kind: "completed" };
					session.text = transcript.text;
					session.confidence = transcript.confidence;
				};
			} catch (error) {
				logError("Failed to transcribe final audio", error, {
					sessionId: item.sessionId,
				});
				const reason = errorMessage(error);
				apply = (session) => {
					session.status = { kind: "failed", reason };
				};
			}

			notify({ type: "ProcessingComplete" });

			const session = await this.sessions.update(item.sessionId, apply);
			if (session) {
				results.push(session);
			}
		}

		await Promise.all(sessionIds.map((id) => this.sessions.remove(id)));

		if (results.length === 1) {
			return { type: "TranscriptionComplete", session: results[0] };
		}
		if (results.length > 1) {
			logger.info(
				{
					sessions: results.map(({ id, status, text }) => ({
						id,
						status: status.kind,
						text,
					})),
				},
				"Finalized several sessions at once",
			);
		}
		return { type: "RecordingStopped" };
	}

	private async getStatus(): Promise<DaemonResponse> {
		const [modelLoaded, activeSessions, bufferSize] = await Promise.all([
			this.model.isLoaded(),
			this.sessions.listIds(),
			this.sessions.bufferedSamples(),
		]);

		return {
			type: "Status",
			status: {
				modelLoaded,
				activeSessions,
				uptimeMs: Date.now() - this.startTime,
				audioDevice: this.options.audioDevice,
				bufferSize,
				vadSensitivity: this.vadSensitivity,
			},
		};
	}

	private async clearSessions(): Promise<DaemonResponse> {
		const cleared = await this.sessions.clear();
		logger.info({ cleared }, "Cleared sessions");
		return { type: "SessionCleared" };
	}

	private async setSensitivity(value: number): Promise<DaemonResponse> {
		if (!Number.isFinite(value) || value < 0 || value > 1) {
			throw new AppError(
				"INVALID_SENSITIVITY",
				"sensitivity must be between 0.0 and 1.0",
				{ value },
			);
		}
		logger.info(
			{ from: this.vadSensitivity, to: value },
			"Voice detection sensitivity changed",
		);
		this.vadSensitivity = value;
		return this.getStatus();
	}
}
