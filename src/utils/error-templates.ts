export interface ErrorTemplate {
	message: string;
	action: string;
}

export const ErrorTemplates = {
	// Model Errors
	MODEL: {
		FILE_NOT_FOUND: (path: string) => ({
			message: `Speech model not found at ${path}.`,
			action:
				"Download a whisper.cpp model (e.g. ggml-base.en.bin) and set 'model.path' in ~/.config/dictation/config.json, or export DICTATION_MODEL_PATH.",
		}),
		LOAD_FAILED: (reason: string) => ({
			message: `Failed to load speech model: ${reason}`,
			action:
				"Check that the model file is a valid ggml model and is readable by the daemon user.",
		}),
		ENGINE_MISSING: (binary: string) => ({
			message: `Transcription engine '${binary}' is not installed.`,
			action:
				"Build whisper.cpp and put 'whisper-cli' on your PATH, or set 'model.binaryPath' in ~/.config/dictation/config.json.",
		}),
	},

	// Daemon Errors
	DAEMON: {
		UNAVAILABLE: {
			message: "Dictation daemon is not running.",
			action: "Start it with 'dictate daemon' and try again.",
		},
		ALREADY_RUNNING: {
			message: "Another daemon instance is already running.",
			action:
				"Stop it with 'dictate shutdown' before starting a new one.",
		},
		TIMEOUT: (seconds: number) => ({
			message: `Daemon did not answer within ${seconds} seconds.`,
			action:
				"The model may still be loading. Check the logs in ~/.config/dictation/logs/ and retry.",
		}),
	},

	// Audio Errors
	AUDIO: {
		INVALID_WAV: (reason: string) => ({
			message: `Unsupported audio file: ${reason}`,
			action: "Provide a 16-bit PCM or 32-bit float WAV file.",
		}),
	},

	// Configuration Errors
	CONFIG: {
		VALIDATION_FAILED: {
			message: "Configuration validation failed.",
			action:
				"Review the error details and fix the invalid fields in ~/.config/dictation/config.json.",
		},
		CORRUPTED: {
			message: "Configuration file is corrupted (invalid JSON).",
			action:
				"Fix the JSON syntax or delete ~/.config/dictation/config.json to fall back to defaults.",
		},
	},
};

export const formatUserError = (template: ErrorTemplate): string => {
	return `${template.message}\n\nAction: ${template.action}`;
};
