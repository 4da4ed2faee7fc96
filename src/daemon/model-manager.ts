import { existsSync } from "node:fs";
import type { AudioFormat } from "../audio/wav";
import { NO_SPEECH_DETECTED } from "../shared/protocol";
import type {
	EngineTranscript,
	ModelHandle,
	SpeechEngine,
} from "../transcribe/engine";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError, errorMessage } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import { RwLock } from "../utils/rw-lock";

interface ModelState {
	handle: ModelHandle | null;
	lastUsed: number | null;
}

export interface ModelManagerOptions {
	modelPath: string;
	language: string | null;
	idleTimeoutSeconds: number;
}

/**
 * Owns the single shared model handle: loads it on first use, serializes
 * inference on it, and drops it after it sits idle.
 *
 * Every state change runs under the exclusive side of one lock, which is
 * what makes concurrent `ensureLoaded()` calls load only once and keeps two
 * transcriptions off the engine at the same time.
 */
export class ModelManager {
	private readonly state = new RwLock<ModelState>({
		handle: null,
		lastUsed: null,
	});
	private idleTimer?: NodeJS.Timeout;
	private loadCount = 0;

	constructor(
		private readonly engine: SpeechEngine,
		private readonly options: ModelManagerOptions,
	) {}

	/** Number of times the engine actually loaded the model. */
	get loads(): number {
		return this.loadCount;
	}

	isLoaded(): Promise<boolean> {
		return this.state.read((state) => state.handle !== null);
	}

	lastUsedAt(): Promise<number | null> {
		return this.state.read((state) => state.lastUsed);
	}

	/**
	 * @throws {AppError} MODEL_FILE_NOT_FOUND, MODEL_LOAD_FAILED
	 */
	ensureLoaded(): Promise<void> {
		return this.state.write(async (state) => {
			if (state.handle) {
				state.lastUsed = Date.now();
				return;
			}

			const { modelPath } = this.options;
			if (!existsSync(modelPath)) {
				throw new AppError(
					"MODEL_FILE_NOT_FOUND",
					formatUserError(ErrorTemplates.MODEL.FILE_NOT_FOUND(modelPath)),
					{ modelPath },
				);
			}

			logger.info({ modelPath, engine: this.engine.name }, "Loading speech model");
			const startedAt = Date.now();
			try {
				state.handle = await this.engine.load(modelPath);
			} catch (error) {
				logError("Failed to load speech model", error, { modelPath });
				throw new AppError(
					"MODEL_LOAD_FAILED",
					formatUserError(ErrorTemplates.MODEL.LOAD_FAILED(errorMessage(error))),
					{ modelPath },
				);
			}

			this.loadCount++;
			state.lastUsed = Date.now();
			logger.info(
				{ modelPath, durationMs: state.lastUsed - startedAt },
				"Speech model loaded",
			);
		});
	}

	/**
	 * Runs inference on the loaded model. Blank output comes back as the
	 * no-speech sentinel so callers can tell it from a skipped run.
	 * @throws {AppError} MODEL_NOT_LOADED, TRANSCRIPTION_FAILED
	 */
	transcribe(
		samples: Float32Array,
		format: AudioFormat,
	): Promise<EngineTranscript> {
		return this.state.write(async (state) => {
			if (!state.handle) {
				throw new AppError("MODEL_NOT_LOADED", "speech model is not loaded");
			}

			let result: EngineTranscript;
			try {
				result = await this.engine.transcribe(state.handle, samples, {
					...format,
					language: this.options.language,
				});
			} catch (error) {
				if (error instanceof AppError) {
					throw error;
				}
				throw new AppError(
					"TRANSCRIPTION_FAILED",
					`Transcription failed: ${errorMessage(error)}`,
					{ engine: this.engine.name },
				);
			} finally {
				state.lastUsed = Date.now();
			}

			const text = result.text.trim();
			return {
				text: text.length > 0 ? text : NO_SPEECH_DETECTED,
				confidence: result.confidence,
			};
		});
	}

	/**
	 * Releases the model once it has gone unused for longer than the timeout.
	 * @returns true if the model was unloaded
	 */
	unloadIfIdle(
		timeoutSeconds: number = this.options.idleTimeoutSeconds,
	): Promise<boolean> {
		return this.state.write(async (state) => {
			if (!state.handle || state.lastUsed === null) {
				return false;
			}
			const idleMs = Date.now() - state.lastUsed;
			if (idleMs <= timeoutSeconds * 1000) {
				return false;
			}

			await this.release(state);
			logger.info({ idleMs }, "Unloaded speech model after idle timeout");
			return true;
		});
	}

	unload(): Promise<void> {
		return this.state.write((state) => this.release(state));
	}

	startIdleMonitor(intervalSeconds: number): void {
		this.stopIdleMonitor();
		this.idleTimer = setInterval(() => {
			this.unloadIfIdle().catch((error) => {
				logError("Idle model unload failed", error);
			});
		}, intervalSeconds * 1000);
		this.idleTimer.unref();
	}

	stopIdleMonitor(): void {
		if (this.idleTimer) {
			clearInterval(this.idleTimer);
			this.idleTimer = undefined;
		}
	}

	private async release(state: ModelState): Promise<void> {
		const handle = state.handle;
		state.handle = null;
		state.lastUsed = null;
		if (handle) {
			await this.engine.unload(handle);
		}
	}
}
