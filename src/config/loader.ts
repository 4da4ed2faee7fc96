import { existsSync, readFileSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError } from "../utils/errors";
import { type Config, ConfigSchema } from "./schema";

export const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "dictation");
export const DEFAULT_CONFIG_FILE = join(DEFAULT_CONFIG_DIR, "config.json");

/**
 * Resolves the path with ~ expansion.
 */
export const resolvePath = (path: string): string => {
	if (path.startsWith("~")) {
		return join(homedir(), path.slice(1));
	}
	return resolve(path);
};

let cachedConfig: Config | null = null;

export const clearConfigCache = (): void => {
	cachedConfig = null;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const sectionOf = (
	fileConfig: Record<string, unknown>,
	key: string,
): Record<string, unknown> => {
	const section = fileConfig[key];
	return isRecord(section) ? section : {};
};

/**
 * Loads and validates the configuration.
 * File values win over defaults; DICTATION_MODEL_PATH and DICTATION_SOCKET
 * win over the file.
 * @throws {AppError} if the file is corrupted or validation fails
 */
export const loadConfig = (
	configPath: string = DEFAULT_CONFIG_FILE,
	forceReload = false,
): Config => {
	if (cachedConfig && !forceReload && configPath === DEFAULT_CONFIG_FILE) {
		return cachedConfig;
	}

	let fileConfig: unknown = {};

	if (existsSync(configPath)) {
		const mode = statSync(configPath).mode & 0o777;
		if ((mode & 0o077) !== 0) {
			console.warn(
				`WARNING: Config file permissions are ${mode.toString(8)}. ` +
					`It is recommended to set them to 600 (chmod 600 ${configPath}).`,
			);
		}

		try {
			fileConfig = JSON.parse(readFileSync(configPath, "utf-8"));
		} catch {
			throw new AppError(
				"CORRUPTED",
				formatUserError(ErrorTemplates.CONFIG.CORRUPTED),
				{ configPath },
			);
		}
	}

	if (!isRecord(fileConfig)) {
		throw new AppError(
			"CORRUPTED",
			formatUserError(ErrorTemplates.CONFIG.CORRUPTED),
			{ configPath },
		);
	}

	const merged: Record<string, unknown> = {
		...fileConfig,
		model: {
			...sectionOf(fileConfig, "model"),
			...(process.env.DICTATION_MODEL_PATH
				? { path: process.env.DICTATION_MODEL_PATH }
				: {}),
		},
		ipc: {
			...sectionOf(fileConfig, "ipc"),
			...(process.env.DICTATION_SOCKET
				? { socketPath: process.env.DICTATION_SOCKET }
				: {}),
		},
	};

	const result = ConfigSchema.safeParse(merged);

	if (!result.success) {
		const errorMessages = result.error.issues
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("\n");
		throw new AppError(
			"VALIDATION_FAILED",
			`${formatUserError(ErrorTemplates.CONFIG.VALIDATION_FAILED)}\n\n${errorMessages}`,
			{ configPath },
		);
	}

	const config = result.data;
	config.model.path = resolvePath(config.model.path);
	config.ipc.socketPath = resolvePath(config.ipc.socketPath);
	config.paths.logs = resolvePath(config.paths.logs);

	if (configPath === DEFAULT_CONFIG_FILE) {
		cachedConfig = config;
	}

	return config;
};
