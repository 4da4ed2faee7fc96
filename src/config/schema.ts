import { z } from "zod";

const MAX_FRAME_BYTES = 64 * 1024 * 1024;

const defaultModel = {
	path: "~/.local/share/dictation/models/ggml-base.en.bin",
	binaryPath: "whisper-cli",
	language: "en",
	threads: 4,
	idleTimeoutSeconds: 300, // 5 minutes
	idleCheckIntervalSeconds: 30,
};

const defaultAudio = {
	device: "default",
	sampleRate: 16000,
	channels: 1,
};

const defaultVad = {
	sensitivity: 0.1,
};

const defaultIpc = {
	socketPath: "~/.config/dictation/daemon.sock",
	timeoutSeconds: 30,
	maxFrameBytes: MAX_FRAME_BYTES,
};

const defaultPaths = {
	logs: "~/.config/dictation/logs/",
};

/**
 * Whisper language codes are two or three lowercase letters, or "auto".
 */
export const languageValidator = (language: string | null) =>
	language === null || language === "auto" || /^[a-z]{2,3}$/.test(language);

export const ModelSchema = z.object({
	path: z.string().min(1).default(defaultModel.path),
	binaryPath: z.string().min(1).default(defaultModel.binaryPath),
	language: z
		.string()
		.nullable()
		.default(defaultModel.language)
		.refine(languageValidator, {
			message: "Language must be a whisper language code (e.g. 'en') or 'auto'.",
		}),
	threads: z.number().int().min(1).max(64).default(defaultModel.threads),
	idleTimeoutSeconds: z
		.number()
		.positive()
		.default(defaultModel.idleTimeoutSeconds),
	idleCheckIntervalSeconds: z
		.number()
		.positive()
		.default(defaultModel.idleCheckIntervalSeconds),
});

export const AudioSchema = z.object({
	device: z.string().default(defaultAudio.device),
	sampleRate: z.number().int().positive().default(defaultAudio.sampleRate),
	channels: z.number().int().min(1).max(8).default(defaultAudio.channels),
});

export const VadSchema = z.object({
	sensitivity: z.number().min(0).max(1).default(defaultVad.sensitivity),
});

export const IpcSchema = z.object({
	socketPath: z.string().min(1).default(defaultIpc.socketPath),
	timeoutSeconds: z.number().positive().default(defaultIpc.timeoutSeconds),
	maxFrameBytes: z
		.number()
		.int()
		.positive()
		.max(0xffffffff)
		.default(defaultIpc.maxFrameBytes),
});

export const PathsSchema = z.object({
	logs: z.string().default(defaultPaths.logs),
});

export const ConfigSchema = z.object({
	model: ModelSchema.default(defaultModel),
	audio: AudioSchema.default(defaultAudio),
	vad: VadSchema.default(defaultVad),
	ipc: IpcSchema.default(defaultIpc),
	paths: PathsSchema.default(defaultPaths),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Raw config file structure before defaults are applied.
 */
export type ConfigFile = z.input<typeof ConfigSchema>;
