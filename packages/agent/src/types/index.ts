/**
 * Type definitions for the agent package.
 */
export { AGENT_STATE } from "./agent.js";
export type { Agent, AgentState, IterationResult } from "./agent.js";
export type { AgentConfig } from "./agent-config.js";
export type { ExecutionSupervisor } from "./supervisor.js";
export type { Logger } from "./logger.js";
export type { ServerClient } from "./server-client.js";
