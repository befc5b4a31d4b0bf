/**
 * Base class for agent-level faults.
 *
 * Any AgentError ends the agent: the CLI logs it and exits non-zero so that
 * the process manager running the agent can restart it. Job failures are
 * never AgentErrors, they are reported as unsuccessful outcomes.
 */
export class AgentError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = this.constructor.name;
	}
}
