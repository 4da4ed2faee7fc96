import type { Config } from "../config/schema";
import type { SpeechEngine } from "../transcribe/engine";
import { WhisperCliEngine } from "../transcribe/whisper-cli";
import { logError, logger } from "../utils/logger";
import { IPCServer } from "./ipc";
import { ModelManager } from "./model-manager";
import { DaemonService } from "./service";
import { SessionRegistry } from "./session-registry";

export interface Daemon {
	service: DaemonService;
	server: IPCServer;
	model: ModelManager;
	sessions: SessionRegistry;
}

/**
 * Wires the daemon's services together from config. The engine can be
 * swapped, which is how tests run the daemon without whisper.cpp.
 */
export function createDaemon(
	config: Config,
	engine: SpeechEngine = new WhisperCliEngine({
		binaryPath: config.model.binaryPath,
		threads: config.model.threads,
	}),
): Daemon {
	const sessions = new SessionRegistry({
		sampleRate: config.audio.sampleRate,
		channels: config.audio.channels,
	});
	const model = new ModelManager(engine, {
		modelPath: config.model.path,
		language: config.model.language,
		idleTimeoutSeconds: config.model.idleTimeoutSeconds,
	});
	const service = new DaemonService(sessions, model, {
		audioDevice: config.audio.device,
		vadSensitivity: config.vad.sensitivity,
		idleCheckIntervalSeconds: config.model.idleCheckIntervalSeconds,
	});
	const server = new IPCServer(service, {
		socketPath: config.ipc.socketPath,
		maxFrameBytes: config.ipc.maxFrameBytes,
	});
	// Accept-time failures such as EMFILE are logged and the daemon keeps serving.
	server.on("error", (error) => logError("IPC server error", error));

	return { service, server, model, sessions };
}

/**
 * Runs the daemon in the foreground until a client sends `Shutdown` or the
 * process gets SIGINT/SIGTERM.
 */
export async function runDaemon(config: Config): Promise<Daemon> {
	const daemon = createDaemon(config);
	const { service, server } = daemon;

	let stopping = false;
	const shutdown = (reason: string) => {
		if (stopping) return;
		stopping = true;
		logger.info({ reason }, "Shutting down daemon");
		Promise.all([server.stop(), service.stop()])
			.catch((error) => logError("Error while stopping daemon", error))
			.finally(() => process.exit(0));
	};

	service.on("shutdown", () => shutdown("client request"));
	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));

	await server.start();
	// Registered only once the socket is ours.
	process.on("exit", () => {
		server.removeSocketFile();
	});
	service.start();

	logger.info(
		{
			pid: process.pid,
			socketPath: config.ipc.socketPath,
			modelPath: config.model.path,
		},
		"Dictation daemon ready",
	);
	return daemon;
}
