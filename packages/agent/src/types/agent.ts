/**
 * Lifecycle states of the agent loop.
 */
export const AGENT_STATE = {
	BOOTSTRAPPING: "BOOTSTRAPPING",
	IDLE: "IDLE",
	POLLING: "POLLING",
	EXECUTING: "EXECUTING",
	NOTIFYING: "NOTIFYING",
	STOPPED: "STOPPED",
	FATAL: "FATAL",
} as const;

export type AgentState = (typeof AGENT_STATE)[keyof typeof AGENT_STATE];

/**
 * What one poll-execute-notify iteration ended with.
 * - executed: a job ran and its outcome was reported
 * - idle: the control plane had no job
 */
export type IterationResult = "executed" | "idle";

/**
 * Agent instance that runs jobs handed out by the control plane.
 */
export interface Agent {
	bootstrap(): Promise<readonly string[]>;
	runOneIteration(): Promise<IterationResult>;
	start(): Promise<void>;
	stop(): void;
	getState(): AgentState;
}
