import { MAX_TIMER_SECONDS } from "../constants.js";
import type { JobSpec, NotificationPayload } from "./job.js";

// =============================================================================
// Control Plane DTOs
// =============================================================================

/**
 * Request body for POST /pop.
 * Advertises the commands this agent can run.
 */
export interface PollRequest {
	/** Capability list reported by the runnable command */
	commands: string[];
}

/**
 * Response body for POST /pop (2xx).
 * Returns 404 when no job is available.
 */
export interface PollResponse {
	id: string;
	command: string;
	/** Usually a string; other JSON values are forwarded JSON-encoded */
	input: unknown;
	/** Execution bound in seconds, absent or 0 for the default, at most MAX_TIMER_SECONDS */
	timeout?: number;
}

/**
 * Request body for POST /notify.
 */
export interface NotifyRequest {
	run_id: string;
	success: boolean;
	/** Primary output of a successful run, null for a failed one */
	output: string | null;
	logs: string;
}

// =============================================================================
// Conversions
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Type guard for a poll response body.
 */
export function isPollResponse(body: unknown): body is PollResponse {
	if (!isRecord(body)) {
		return false;
	}
	if (typeof body.id !== "string" || typeof body.command !== "string") {
		return false;
	}
	if (body.timeout !== undefined) {
		return typeof body.timeout === "number"
			&& Number.isInteger(body.timeout)
			&& body.timeout >= 0
			&& body.timeout <= MAX_TIMER_SECONDS;
	}
	return true;
}

/**
 * Convert a poll response body into a JobSpec.
 * Returns null when the body does not describe a job.
 */
export function parseJobSpec(body: unknown): JobSpec | null {
	if (!isPollResponse(body)) {
		return null;
	}

	let input: string;
	if (typeof body.input === "string") {
		input = body.input;
	} else if (body.input === undefined) {
		input = "";
	} else {
		input = JSON.stringify(body.input);
	}

	return {
		id: body.id,
		command: body.command,
		input,
		timeoutSeconds: body.timeout ?? 0,
	};
}

/**
 * Convert a notification into the body sent to POST /notify.
 */
export function toNotifyRequest(payload: NotificationPayload): NotifyRequest {
	return {
		run_id: payload.runId,
		success: payload.success,
		output: payload.output,
		logs: payload.logs,
	};
}

/**
 * Parse the primary output of the list command.
 * Returns null unless it is a JSON array of strings.
 */
export function parseCapabilityList(output: string): string[] | null {
	let parsed: unknown;
	try {
		parsed = JSON.parse(output);
	} catch {
		return null;
	}
	if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === "string")) {
		return null;
	}
	return parsed;
}
