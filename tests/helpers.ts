import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type {
	EngineTranscript,
	ModelHandle,
	SpeechEngine,
	TranscribeOptions,
} from "../src/transcribe/engine";

/**
 * Runs `fn` and returns what it threw.
 */
export const thrownBy = (fn: () => unknown): unknown => {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error("expected function to throw");
};

export async function* streamOf(...parts: Uint8Array[]): AsyncGenerator<Uint8Array> {
	for (const part of parts) {
		yield part;
	}
}

export const splitEvery = (bytes: Uint8Array, size: number): Uint8Array[] => {
	const parts: Uint8Array[] = [];
	for (let i = 0; i < bytes.length; i += size) {
		parts.push(bytes.subarray(i, i + size));
	}
	return parts;
};

export const frameOf = (payload: Uint8Array): Buffer => {
	const frame = Buffer.alloc(4 + payload.length);
	frame.writeUInt32LE(payload.length, 0);
	frame.set(payload, 4);
	return frame;
};

export const SESSION_ID = "0b6f5a2e-4c1d-4f7a-9a53-3c2e1f0d9b8a";

/**
 * In-process stand-in for whisper.cpp. Records every call and answers with
 * `text`, or with whatever `onTranscribe` returns. `onLoad` holds a load open.
 */
export class FakeEngine implements SpeechEngine {
	readonly name = "fake";
	loadCalls = 0;
	unloadCalls = 0;
	transcribeCalls: Array<{ samples: Float32Array; options: TranscribeOptions }> =
		[];
	text = "hello world";
	loadError: Error | null = null;
	onTranscribe?: () => Promise<EngineTranscript>;
	onLoad?: () => Promise<void>;

	async load(modelPath: string): Promise<ModelHandle> {
		this.loadCalls++;
		if (this.onLoad) {
			await this.onLoad();
		} else {
			// Yield so concurrent callers really overlap.
			await new Promise((resolve) => setTimeout(resolve, 5));
		}
		if (this.loadError) {
			throw this.loadError;
		}
		return { modelPath, loadedAt: Date.now() };
	}

	async unload(): Promise<void> {
		this.unloadCalls++;
	}

	async transcribe(
		_handle: ModelHandle,
		samples: Float32Array,
		options: TranscribeOptions,
	): Promise<EngineTranscript> {
		this.transcribeCalls.push({ samples, options });
		if (this.onTranscribe) {
			return this.onTranscribe();
		}
		return { text: this.text, confidence: null };
	}
}

/**
 * Creates a throwaway directory holding a file that passes for a model.
 */
export const makeModelFile = (): { dir: string; modelPath: string } => {
	const dir = mkdtempSync(join(tmpdir(), "dictation-model-"));
	const modelPath = join(dir, "ggml-test.bin");
	writeFileSync(modelPath, Buffer.from([0x6c, 0x6d, 0x67, 0x67]));
	return { dir, modelPath };
};

export const chunkOf = (
	samples: Float32Array,
	sessionId: string = SESSION_ID,
	sampleRate = 16000,
	channels = 1,
) => ({ sessionId, samples, sampleRate, channels, timestamp: Date.now() });
