import { EventEmitter } from "node:events";
import { createConnection, type Socket } from "node:net";
import type { AudioFormat } from "../audio/wav";
import {
	DEFAULT_MAX_FRAME_BYTES,
	FrameReader,
	decodeDaemonMessage,
	encodeFrame,
} from "../shared/codec";
import {
	type ClientMessage,
	type DaemonResponse,
	type SessionId,
	isNotification,
} from "../shared/protocol";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError } from "../utils/errors";
import { type RetryOptions, withRetry } from "../utils/retry";

const DEFAULT_TIMEOUT_MS = 30_000;

export interface DaemonClientOptions {
	socketPath: string;
	/** Per-request response timeout. */
	timeoutMs?: number;
	maxFrameBytes?: number;
}

interface Connection {
	socket: Socket;
	reader: FrameReader;
}

/**
 * One connection to the daemon. Requests on a connection are answered in
 * order, so they are queued and sent one at a time. Notifications that
 * arrive ahead of a response are emitted as `notification` events.
 */
export class DaemonClient extends EventEmitter {
	private connection: Connection | null = null;
	private queue: Promise<unknown> = Promise.resolve();

	constructor(private readonly options: DaemonClientOptions) {
		super();
	}

	get connected(): boolean {
		return this.connection !== null && !this.connection.socket.destroyed;
	}

	connect(): Promise<void> {
		if (this.connection) {
			return Promise.resolve();
		}

		return new Promise((resolve, reject) => {
			const socket = createConnection({ path: this.options.socketPath });

			const onConnectError = (err: NodeJS.ErrnoException) => {
				socket.destroy();
				if (err.code === "ECONNREFUSED" || err.code === "ENOENT") {
					reject(
						new AppError(
							"DAEMON_UNAVAILABLE",
							formatUserError(ErrorTemplates.DAEMON.UNAVAILABLE),
							{ socketPath: this.options.socketPath, code: err.code },
						),
					);
				} else {
					reject(err);
				}
			};

			socket.once("error", onConnectError);
			socket.once("connect", () => {
				socket.off("error", onConnectError);
				socket.on("error", (err) => {
					// Read failures reach the pending request through the reader;
					// this only keeps an unheard error from crashing the process.
					if (this.listenerCount("error") > 0) {
						this.emit("error", err);
					}
				});
				socket.on("close", () => {
					this.connection = null;
					this.emit("disconnected");
				});
				this.connection = {
					socket,
					reader: new FrameReader(
						socket,
						this.options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
					),
				};
				resolve();
			});
		});
	}

	/**
	 * Sends a message and resolves with the daemon's response.
	 * @throws {AppError} CONNECTION_CLOSED, DAEMON_TIMEOUT
	 */
	request(message: ClientMessage): Promise<DaemonResponse> {
		const run = this.queue.then(() => this.exchange(message));
		this.queue = run.catch(() => undefined);
		return run;
	}

	/**
	 * Writes a message without waiting for a reply.
	 */
	send(message: ClientMessage): Promise<void> {
		const { socket } = this.requireConnection();
		return new Promise((resolve, reject) => {
			socket.write(encodeFrame(message), (err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	/**
	 * Streams samples to a session in chunks of `chunkSeconds`.
	 * @throws {AppError} INVALID_AUDIO_FORMAT when the format has no channels
	 * or no sample rate
	 * @throws {AppError} UNEXPECTED_RESPONSE when the daemon rejects a chunk
	 */
	async streamAudio(
		sessionId: SessionId,
		samples: Float32Array,
		format: AudioFormat,
		chunkSeconds = 0.1,
	): Promise<void> {
		const frameSize = Math.max(
			format.channels,
			Math.round(format.sampleRate * chunkSeconds) * format.channels,
		);
		if (format.channels < 1 || format.sampleRate < 1 || frameSize < 1) {
			throw new AppError(
				"INVALID_AUDIO_FORMAT",
				`cannot stream ${format.channels} channels at ${format.sampleRate} Hz`,
			);
		}

		for (let offset = 0; offset < samples.length; offset += frameSize) {
			const response = await this.request({
				type: "StreamAudio",
				chunk: {
					sessionId,
					samples: samples.slice(offset, offset + frameSize),
					sampleRate: format.sampleRate,
					channels: format.channels,
					timestamp: Date.now(),
				},
			});
			if (response.type !== "TranscriptionUpdate") {
				throw unexpected(response);
			}
		}
	}

	/**
	 * Resolves once the daemon side closes the connection.
	 */
	waitForClose(): Promise<void> {
		const connection = this.connection;
		if (!connection) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			connection.socket.once("close", () => resolve());
		});
	}

	close(): void {
		if (this.connection) {
			this.connection.socket.end();
			this.connection = null;
		}
	}

	private async exchange(message: ClientMessage): Promise<DaemonResponse> {
		const { socket, reader } = this.requireConnection();
		const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

		socket.write(encodeFrame(message));

		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				socket.destroy();
				reject(
					new AppError(
						"DAEMON_TIMEOUT",
						formatUserError(ErrorTemplates.DAEMON.TIMEOUT(timeoutMs / 1000)),
						{ type: message.type },
					),
				);
			}, timeoutMs);
		});

		try {
			return await Promise.race([this.readResponse(reader), timeout]);
		} finally {
			clearTimeout(timer);
		}
	}

	private async readResponse(reader: FrameReader): Promise<DaemonResponse> {
		for (;;) {
			const message = await reader.readMessage(decodeDaemonMessage);
			if (message === null) {
				throw new AppError(
					"CONNECTION_CLOSED",
					"daemon closed the connection before responding",
				);
			}
			if (isNotification(message)) {
				this.emit("notification", message);
				continue;
			}
			return message;
		}
	}

	private requireConnection(): Connection {
		if (!this.connection) {
			throw new AppError("CONNECTION_CLOSED", "not connected to the daemon");
		}
		return this.connection;
	}
}

export const unexpected = (response: DaemonResponse): AppError =>
	response.type === "Error"
		? new AppError("UNEXPECTED_RESPONSE", response.message)
		: new AppError(
				"UNEXPECTED_RESPONSE",
				`unexpected response from daemon: ${response.type}`,
			);

/**
 * Opens a client connection, retrying while the daemon is still starting.
 */
export async function connectToDaemon(
	options: DaemonClientOptions,
	retry: RetryOptions = {},
): Promise<DaemonClient> {
	const client = new DaemonClient(options);
	await withRetry(() => client.connect(), {
		maxRetries: 3,
		backoffs: [100, 250, 500],
		operationName: "Daemon connection",
		shouldRetry: (error) =>
			error instanceof AppError && error.code === "DAEMON_UNAVAILABLE",
		...retry,
	});
	return client;
}
