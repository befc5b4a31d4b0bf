import { AgentError } from "./agent-error.js";

/**
 * Transport or protocol failure while talking to the control plane.
 * status is the HTTP status when a response was received.
 */
export class ControlPlaneError extends AgentError {
	readonly status: number | null;

	constructor(message: string, status: number | null = null, options?: ErrorOptions) {
		super(message, options);
		this.status = status;
	}
}

/**
 * Thrown when polling for a job fails
 */
export class PollError extends ControlPlaneError {}

/**
 * Thrown when reporting a job outcome fails
 */
export class NotifyError extends ControlPlaneError {}
