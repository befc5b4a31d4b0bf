import { AgentError } from "./agent-error.js";

/**
 * Thrown when the runnable command cannot list the commands it supports
 */
export class CapabilityDiscoveryError extends AgentError {
	constructor(reason: string) {
		super(`Could not fetch commands list: ${reason}`);
	}
}
