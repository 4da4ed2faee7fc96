export type ErrorCode =
	| "SESSION_NOT_FOUND"
	| "SESSION_NOT_RECORDING"
	| "AUDIO_BUFFER_DRAINED"
	| "MODEL_NOT_LOADED"
	| "MODEL_FILE_NOT_FOUND"
	| "MODEL_LOAD_FAILED"
	| "ENGINE_MISSING"
	| "TRANSCRIPTION_FAILED"
	| "INVALID_SENSITIVITY"
	| "INVALID_AUDIO_FILE"
	| "INVALID_AUDIO_FORMAT"
	| "FRAME_TRUNCATED"
	| "FRAME_MALFORMED"
	| "FRAME_TOO_LARGE"
	| "DAEMON_UNAVAILABLE"
	| "DAEMON_ALREADY_RUNNING"
	| "DAEMON_TIMEOUT"
	| "CONNECTION_CLOSED"
	| "UNEXPECTED_RESPONSE"
	| "VALIDATION_FAILED"
	| "CORRUPTED"
	| "UNKNOWN_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly context?: Record<string, unknown>;

	constructor(
		code: ErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(message);
		this.code = code;
		this.context = context;
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

export type ProtocolErrorCode = Extract<
	ErrorCode,
	"FRAME_TRUNCATED" | "FRAME_MALFORMED" | "FRAME_TOO_LARGE"
>;

/**
 * Raised by the wire codec. The connection that produced it is closed;
 * the daemon keeps serving everyone else.
 */
export class ProtocolError extends AppError {
	constructor(
		code: ProtocolErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(code, message, context);
		this.name = "ProtocolError";
		Object.setPrototypeOf(this, ProtocolError.prototype);
	}
}

export class TranscriptionError extends AppError {
	public readonly engine: string;

	constructor(
		engine: string,
		code: ErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(code, message, { ...context, engine });
		this.engine = engine;
		this.name = "TranscriptionError";
		Object.setPrototypeOf(this, TranscriptionError.prototype);
	}
}

export const isErrnoException = (
	error: unknown,
): error is NodeJS.ErrnoException =>
	error instanceof Error && "code" in error && typeof error.code === "string";

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
