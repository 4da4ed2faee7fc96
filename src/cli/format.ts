import * as colors from "yoctocolors";
import type { DaemonStatus, TranscriptionSession } from "../shared/protocol";

export const formatUptime = (uptimeMs: number): string => {
	const totalSeconds = Math.floor(uptimeMs / 1000);
	const hours = Math.floor(totalSeconds / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	const seconds = totalSeconds % 60;
	if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
	if (minutes > 0) return `${minutes}m ${seconds}s`;
	return `${seconds}s`;
};

export function formatStatus(status: DaemonStatus): string {
	const model = status.modelLoaded
		? colors.green("loaded")
		: colors.yellow("unloaded");
	const sessions =
		status.activeSessions.length > 0
			? status.activeSessions.join(", ")
			: colors.dim("none");

	return [
		`Model:       ${model}`,
		`Sessions:    ${sessions}`,
		`Buffered:    ${status.bufferSize} samples`,
		`Device:      ${status.audioDevice}`,
		`Sensitivity: ${status.vadSensitivity.toFixed(2)}`,
		`Uptime:      ${formatUptime(status.uptimeMs)}`,
	].join("\n");
}

/**
 * Failed sessions render their reason in red; completed ones print the
 * bare text so the output can be piped.
 */
export function formatTranscript(session: TranscriptionSession): string {
	if (session.status.kind === "failed") {
		return colors.red(`Transcription failed: ${session.status.reason}`);
	}
	return session.text;
}
