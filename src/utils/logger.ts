import { existsSync, mkdirSync, readdirSync, statSync } from "node:fs";
import { unlink } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { createStream } from "rotating-file-stream";
import { loadConfig } from "../config/loader";

const LOG_FILE_PREFIX = "dictation-";
const LOG_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

const resolveLogDir = (): string => {
	if (process.env.DICTATION_LOG_DIR) {
		return process.env.DICTATION_LOG_DIR;
	}
	try {
		return loadConfig().paths.logs;
	} catch {
		return join(homedir(), ".config", "dictation", "logs");
	}
};

const logDir = resolveLogDir();

if (!existsSync(logDir)) {
	mkdirSync(logDir, { recursive: true, mode: 0o700 });
}

const pruneLogs = async (dir: string) => {
	const now = Date.now();
	for (const file of readdirSync(dir)) {
		if (!file.startsWith(LOG_FILE_PREFIX) || !file.endsWith(".log")) {
			continue;
		}
		const filePath = join(dir, file);
		if (now - statSync(filePath).mtimeMs > LOG_RETENTION_MS) {
			await unlink(filePath);
		}
	}
};

pruneLogs(logDir).catch((e) => {
	console.debug("Log pruning failed:", e);
});

const rotatingStream = createStream(
	(time) => {
		const date = time ? new Date(time) : new Date();
		const dateStr = date.toISOString().split("T")[0];
		return `${LOG_FILE_PREFIX}${dateStr}.log`;
	},
	{
		interval: "1d",
		path: logDir,
	},
);

const streams = [{ stream: rotatingStream }, { stream: pino.destination(1) }];

export const logger = pino(
	{
		level: process.env.LOG_LEVEL || "info",
		base: {
			pid: process.pid,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		serializers: {
			err: pino.stdSerializers.err,
			error: pino.stdSerializers.err,
		},
	},
	pino.multistream(streams),
);

export const logError = (
	msg: string,
	error?: unknown,
	context?: Record<string, unknown>,
) => {
	const errorObj =
		error instanceof Error
			? error
			: new Error(String(error || "Unknown error"));
	logger.error({ err: errorObj, ...context }, msg);
};
