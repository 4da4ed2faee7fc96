export type SessionId = string;

export type SessionStatus =
	| { kind: "recording" }
	| { kind: "processing" }
	| { kind: "completed" }
	| { kind: "failed"; reason: string };

export interface TranscriptionSession {
	id: SessionId;
	status: SessionStatus;
	text: string;
	confidence: number | null;
	/** Epoch milliseconds. */
	createdAt: number;
}

export interface AudioChunk {
	sessionId: SessionId;
	samples: Float32Array;
	sampleRate: number;
	channels: number;
	/** Capture time, epoch milliseconds. */
	timestamp: number;
}

export interface DaemonStatus {
	modelLoaded: boolean;
	activeSessions: SessionId[];
	uptimeMs: number;
	audioDevice: string;
	/** Samples buffered across all sessions. */
	bufferSize: number;
	vadSensitivity: number;
}

export type ClientMessage =
	| { type: "StartRecording" }
	| { type: "StopRecording" }
	| { type: "StreamAudio"; chunk: AudioChunk }
	| { type: "GetStatus" }
	| { type: "ClearSession" }
	| { type: "SetSensitivity"; value: number }
	| { type: "Shutdown" };

export type DaemonResponse =
	| { type: "RecordingStarted"; sessionId: SessionId }
	| { type: "RecordingStopped" }
	| {
			type: "TranscriptionUpdate";
			sessionId: SessionId;
			partialText: string;
			isFinal: boolean;
	  }
	| { type: "TranscriptionComplete"; session: TranscriptionSession }
	| { type: "Error"; message: string }
	| { type: "Status"; status: DaemonStatus }
	| { type: "SessionCleared" };

/**
 * Sent ahead of a response on the same connection. Clients waiting for a
 * response skip these.
 */
export type DaemonNotification =
	| { type: "AudioLevel"; level: number }
	| { type: "VoiceActivityDetected" }
	| { type: "VoiceActivityEnded" }
	| { type: "ProcessingStarted" }
	| { type: "ProcessingComplete" };

export type DaemonMessage = DaemonResponse | DaemonNotification;

export type DaemonMessageType = DaemonMessage["type"];

const NOTIFICATION_TYPES = new Set<DaemonMessageType>([
	"AudioLevel",
	"VoiceActivityDetected",
	"VoiceActivityEnded",
	"ProcessingStarted",
	"ProcessingComplete",
]);

export const isNotification = (
	message: DaemonMessage,
): message is DaemonNotification => NOTIFICATION_TYPES.has(message.type);

export const NO_SPEECH_DETECTED = "[No speech detected]";
