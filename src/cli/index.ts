#!/usr/bin/env tsx
import { readFileSync } from "node:fs";
import { Command } from "commander";
import * as colors from "yoctocolors";
import { decodeWav } from "../audio/wav";
import {
	type DaemonClient,
	connectToDaemon,
	unexpected,
} from "../client/ipc-client";
import { DEFAULT_CONFIG_FILE, loadConfig } from "../config/loader";
import { runDaemon } from "../daemon/runner";
import type { DaemonMessage, DaemonStatus } from "../shared/protocol";
import { errorMessage } from "../utils/errors";
import { formatStatus, formatTranscript } from "./format";

const program = new Command();

program
	.name("dictate")
	.description("Local voice dictation daemon and client")
	.version("0.1.0")
	.option("-c, --config <path>", "Config file", DEFAULT_CONFIG_FILE);

const config = () => loadConfig(program.opts<{ config: string }>().config);

const withClient = async <T>(fn: (client: DaemonClient) => Promise<T>) => {
	const { ipc } = config();
	const client = await connectToDaemon({
		socketPath: ipc.socketPath,
		timeoutMs: ipc.timeoutSeconds * 1000,
		maxFrameBytes: ipc.maxFrameBytes,
	});
	try {
		return await fn(client);
	} finally {
		client.close();
	}
};

const fail = (error: unknown): never => {
	console.error(colors.red(errorMessage(error)));
	process.exit(1);
};

const printStopResult = (response: DaemonMessage) => {
	if (response.type === "TranscriptionComplete") {
		console.log(formatTranscript(response.session));
	} else if (response.type === "RecordingStopped") {
		console.log(colors.yellow("Recording stopped (no transcript)."));
	} else if (response.type === "Error") {
		fail(response.message);
	}
};

program
	.command("daemon")
	.description("Run the daemon in the foreground")
	.action(async () => {
		await runDaemon(config()).catch(fail);
	});

program
	.command("start")
	.description("Start a recording session")
	.action(async () => {
		await withClient(async (client) => {
			const response = await client.request({ type: "StartRecording" });
			if (response.type !== "RecordingStarted") throw unexpected(response);
			console.log(response.sessionId);
		}).catch(fail);
	});

program
	.command("stop")
	.description("Stop recording and print the transcript")
	.action(async () => {
		await withClient(async (client) => {
			printStopResult(await client.request({ type: "StopRecording" }));
		}).catch(fail);
	});

program
	.command("status")
	.description("Show daemon status")
	.option("--json", "Print raw JSON")
	.action(async (options: { json?: boolean }) => {
		await withClient(async (client) => {
			const response = await client.request({ type: "GetStatus" });
			if (response.type !== "Status") throw unexpected(response);
			printStatus(response.status, options.json ?? false);
		}).catch(fail);
	});

program
	.command("clear")
	.description("Discard every active session without transcribing")
	.action(async () => {
		await withClient(async (client) => {
			const response = await client.request({ type: "ClearSession" });
			if (response.type !== "SessionCleared") throw unexpected(response);
			console.log(colors.green("Sessions cleared."));
		}).catch(fail);
	});

program
	.command("sensitivity <value>")
	.description("Set voice detection sensitivity (0.0-1.0)")
	.action(async (value: string) => {
		await withClient(async (client) => {
			const response = await client.request({
				type: "SetSensitivity",
				value: Number.parseFloat(value),
			});
			if (response.type !== "Status") throw unexpected(response);
			console.log(
				`Sensitivity: ${colors.bold(response.status.vadSensitivity.toFixed(2))}`,
			);
		}).catch(fail);
	});

program
	.command("shutdown")
	.description("Stop the daemon process")
	.action(async () => {
		await withClient(async (client) => {
			const closed = client.waitForClose();
			await client.send({ type: "Shutdown" });
			await closed;
			console.log(colors.green("Daemon stopped."));
		}).catch(fail);
	});

program
	.command("transcribe <file>")
	.description("Stream a WAV file through the daemon and print the transcript")
	.option("--verbose", "Print voice activity and processing events")
	.action(async (file: string, options: { verbose?: boolean }) => {
		await withClient(async (client) => {
			const audio = decodeWav(readFileSync(file));

			if (options.verbose) {
				client.on("notification", (message: DaemonMessage) => {
					if (message.type !== "AudioLevel") {
						console.error(colors.dim(message.type));
					}
				});
			}

			const started = await client.request({ type: "StartRecording" });
			if (started.type !== "RecordingStarted") throw unexpected(started);

			await client.streamAudio(started.sessionId, audio.samples, audio);
			printStopResult(await client.request({ type: "StopRecording" }));
		}).catch(fail);
	});

function printStatus(status: DaemonStatus, json: boolean) {
	if (json) {
		console.log(JSON.stringify(status, null, 2));
		return;
	}
	console.log(formatStatus(status));
}

program.parseAsync(process.argv).catch(fail);
