import { AgentError } from "./agent-error.js";

/**
 * Thrown when the runnable command cannot be started or waited on
 */
export class ProcessSpawnError extends AgentError {
	constructor(command: string, cause: unknown) {
		super(`Could not run ${command}`, { cause });
	}
}

/**
 * Thrown when a timed-out process cannot be terminated
 */
export class ProcessKillError extends AgentError {
	constructor(command: string, pid: number | undefined) {
		super(`Failed to kill process ${command} (pid=${pid ?? "unknown"})`);
	}
}
