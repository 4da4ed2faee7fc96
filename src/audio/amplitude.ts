/**
 * Calculate RMS (Root Mean Square) amplitude of float samples.
 * Returns normalized value between 0.0 and 1.0
 */
export function calculateAmplitude(samples: Float32Array): number {
	if (samples.length === 0) {
		return 0;
	}

	let sum = 0;
	for (const sample of samples) {
		sum += sample * sample;
	}

	const rms = Math.sqrt(sum / samples.length);

	// Clamp to 0.0 - 1.0 range
	return Math.min(Math.max(rms, 0), 1);
}

/**
 * Voice-activity detector driven by chunk amplitude.
 *
 * Speech starts when the smoothed level reaches the threshold and ends once
 * it falls below half of it, so a level hovering at the threshold does not
 * flap between the two states.
 */
export class VoiceActivityDetector {
	private lastAmplitude = 0;
	private active = false;

	constructor(private readonly smoothingFactor = 0.5) {}

	get isActive(): boolean {
		return this.active;
	}

	get level(): number {
		return this.lastAmplitude;
	}

	/**
	 * Feeds one chunk; returns the transition it caused, if any.
	 */
	update(samples: Float32Array, threshold: number): "started" | "ended" | null {
		this.lastAmplitude =
			this.smoothingFactor * calculateAmplitude(samples) +
			(1 - this.smoothingFactor) * this.lastAmplitude;

		if (!this.active && this.lastAmplitude >= threshold) {
			this.active = true;
			return "started";
		}
		if (this.active && this.lastAmplitude < threshold / 2) {
			this.active = false;
			return "ended";
		}
		return null;
	}

	reset(): void {
		this.lastAmplitude = 0;
		this.active = false;
	}
}
