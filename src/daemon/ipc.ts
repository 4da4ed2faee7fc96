import { EventEmitter } from "node:events";
import { chmodSync, existsSync, mkdirSync, unlinkSync } from "node:fs";
import {
	createConnection,
	createServer,
	type Server,
	type Socket,
} from "node:net";
import { dirname } from "node:path";
import {
	DEFAULT_MAX_FRAME_BYTES,
	FrameReader,
	decodeClientMessage,
	encodeFrame,
} from "../shared/codec";
import type { DaemonMessage } from "../shared/protocol";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError, ProtocolError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { DaemonService } from "./service";

export type MessageHandler = Pick<DaemonService, "handleMessage">;

export interface IPCServerOptions {
	socketPath: string;
	maxFrameBytes?: number;
}

/**
 * Unix socket listener. Each connection gets its own request/response loop;
 * a failing connection is closed without touching the others.
 */
export class IPCServer extends EventEmitter {
	private server: Server | null = null;
	private clients: Map<number, Socket> = new Map();
	private clientIdCounter = 0;
	private readonly maxFrameBytes: number;

	constructor(
		private readonly handler: MessageHandler,
		private readonly options: IPCServerOptions,
	) {
		super();
		this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
	}

	get socketPath(): string {
		return this.options.socketPath;
	}

	get clientCount(): number {
		return this.clients.size;
	}

	/**
	 * Resolves true when a socket file exists but nothing is listening on it.
	 */
	private async isStaleSocket(): Promise<boolean> {
		if (!existsSync(this.socketPath)) {
			return false;
		}

		return new Promise((resolve) => {
			const probe = createConnection({ path: this.socketPath });
			const timeout = setTimeout(() => {
				probe.destroy();
				resolve(true);
			}, 1000);

			probe.on("connect", () => {
				clearTimeout(timeout);
				probe.destroy();
				resolve(false);
			});

			probe.on("error", (err: NodeJS.ErrnoException) => {
				clearTimeout(timeout);
				probe.destroy();
				logger.debug(
					{ code: err.code, path: this.socketPath },
					"Socket file has no listener",
				);
				resolve(true);
			});
		});
	}

	removeSocketFile(): void {
		try {
			if (existsSync(this.socketPath)) {
				unlinkSync(this.socketPath);
				logger.debug({ path: this.socketPath }, "Removed socket file");
			}
		} catch (err) {
			logger.warn({ err, path: this.socketPath }, "Failed to remove socket file");
		}
	}

	async start(): Promise<void> {
		if (existsSync(this.socketPath)) {
			if (!(await this.isStaleSocket())) {
				throw new AppError(
					"DAEMON_ALREADY_RUNNING",
					formatUserError(ErrorTemplates.DAEMON.ALREADY_RUNNING),
					{ socketPath: this.socketPath },
				);
			}
			this.removeSocketFile();
		}

		mkdirSync(dirname(this.socketPath), { recursive: true, mode: 0o700 });

		return new Promise((resolve, reject) => {
			const server = createServer((socket) => {
				this.handleClientConnection(socket);
			});

			server.on("error", (err: NodeJS.ErrnoException) => {
				if (err.code === "EADDRINUSE") {
					reject(
						new AppError("DAEMON_ALREADY_RUNNING", "Socket address already in use", {
							socketPath: this.socketPath,
						}),
					);
				} else {
					this.emit("error", err);
					reject(err);
				}
			});

			server.listen(this.socketPath, () => {
				chmodSync(this.socketPath, 0o600);
				this.server = server;
				logger.info({ path: this.socketPath }, "IPC server started");
				resolve();
			});
		});
	}

	async stop(): Promise<void> {
		for (const [clientId, socket] of this.clients) {
			socket.destroy();
			logger.debug({ clientId }, "Closed client connection");
		}
		this.clients.clear();

		const server = this.server;
		if (!server) {
			return;
		}
		this.server = null;

		return new Promise((resolve) => {
			server.close(() => {
				this.removeSocketFile();
				logger.info("IPC server stopped");
				resolve();
			});
		});
	}

	private handleClientConnection(socket: Socket): void {
		const clientId = ++this.clientIdCounter;
		this.clients.set(clientId, socket);

		logger.debug({ clientId }, "IPC client connected");
		this.emit("clientConnected", clientId);

		socket.on("error", (err) => {
			logger.warn({ clientId, err }, "IPC client error");
		});

		socket.on("close", () => {
			this.clients.delete(clientId);
			logger.debug({ clientId }, "IPC client disconnected");
			this.emit("clientDisconnected", clientId);
		});

		this.serveConnection(clientId, socket).catch((err) => {
			logger.warn({ clientId, err }, "IPC connection loop failed");
			socket.destroy();
		});
	}

	private async serveConnection(clientId: number, socket: Socket): Promise<void> {
		const reader = new FrameReader(socket, this.maxFrameBytes);

		try {
			for (;;) {
				const message = await reader.readMessage(decodeClientMessage);
				if (message === null) {
					break;
				}
				logger.debug(
					{ clientId, type: message.type },
					"Received message from client",
				);

				const response = await this.handler.handleMessage(
					message,
					(notification) => {
						this.send(socket, notification);
					},
				);
				if (response === null || !this.send(socket, response)) {
					break;
				}
			}
			socket.end();
		} catch (err) {
			if (err instanceof ProtocolError) {
				logger.warn(
					{ clientId, code: err.code, err },
					"Closing connection after protocol error",
				);
			} else {
				logger.warn({ clientId, err }, "Closing connection after read failure");
			}
			socket.destroy();
		}
	}

	private send(socket: Socket, message: DaemonMessage): boolean {
		if (socket.destroyed || !socket.writable) {
			return false;
		}
		socket.write(encodeFrame(message));
		return true;
	}
}
