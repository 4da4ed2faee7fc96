import type { AudioFormat } from "../audio/wav";

/**
 * Reference to a loaded model. Engines may return richer handles; the
 * daemon only ever passes them back.
 */
export interface ModelHandle {
	readonly modelPath: string;
	readonly loadedAt: number;
}

export interface TranscribeOptions extends AudioFormat {
	/** Whisper language code, "auto", or null for the model default. */
	language: string | null;
}

export interface EngineTranscript {
	text: string;
	confidence: number | null;
}

/**
 * Speech-to-text backend. `transcribe` is never called concurrently on one
 * handle; the model manager serializes it.
 */
export interface SpeechEngine {
	readonly name: string;
	load(modelPath: string): Promise<ModelHandle>;
	unload(handle: ModelHandle): Promise<void>;
	transcribe(
		handle: ModelHandle,
		samples: Float32Array,
		options: TranscribeOptions,
	): Promise<EngineTranscript>;
}
