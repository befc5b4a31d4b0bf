import type { JobSpec, NotificationPayload } from "@remote-job-agent/shared";

/**
 * Client for the control plane.
 * Both operations reject on transport or protocol errors.
 */
export interface ServerClient {
	/** Ask for a job; resolves null when none is available. */
	poll(capabilities: readonly string[]): Promise<JobSpec | null>;
	/** Report the outcome of a job. */
	notify(payload: NotificationPayload): Promise<void>;
}
