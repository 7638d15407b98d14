/**
 * Progress event helpers for edit operations.
 *
 * Operations report what they are doing through a listener instead of
 * writing to the console directly, so callers can capture, forward or
 * silence the messages. `logProgress` is the default listener.
 *
 * @module
 */

export type ProgressLevel = "info" | "warn"

/**
 * Progress payload containing a message, its level and a timestamp.
 */
export type Progress = {
	msg: string
	level: ProgressLevel
	timestamp: number
}

/** CustomEvent carrying progress details. */
export interface ProgressEvent extends CustomEvent<Progress> {}

export type ProgressListener = (progress: ProgressEvent) => void

/**
 * Create a Progress payload with current timestamp.
 */
export function progress(msg: string, level: ProgressLevel = "info"): Progress {
	return {
		msg,
		level,
		timestamp: Date.now(),
	}
}

/**
 * Create a ProgressEvent with the given message.
 */
export function progressEvent(
	msg: string,
	level: ProgressLevel = "info",
): ProgressEvent {
	return new CustomEvent("progress", { detail: progress(msg, level) })
}

/**
 * Extract the message string from a progress event.
 */
export function progressEventMessage(event: ProgressEvent): string {
	return event.detail.msg
}

/**
 * Log a progress event's message to the console. Warnings go to `console.warn`.
 */
export function logProgress(progress: ProgressEvent) {
	if (progress.detail.level === "warn") {
		console.warn(progressEventMessage(progress))
	} else {
		console.log(progressEventMessage(progress))
	}
}

/** Listener that drops every event. */
export function ignoreProgress(_progress: ProgressEvent) {}
