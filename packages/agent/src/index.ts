/**
 * Agent package public API
 *
 * This module exports the agent, its collaborators and the configuration loader.
 */

// Agent
export { AgentImpl } from "./agent.js";
export { AGENT_STATE } from "./types/index.js";
export type { Agent, AgentState, IterationResult } from "./types/index.js";

// Configuration
export { ENV_VARS, loadConfig, splitRunner } from "./config/index.js";
export type { AgentConfig } from "./types/index.js";

// Class implementations
export { LoggerImpl, setLogLevel, type LogLevel } from "./logger/index.js";
export { ServerClientImpl } from "./server-client.js";
export { ExecutionSupervisorImpl, resolveTimeoutSeconds } from "./supervisor.js";
export type { SpawnFn, SupervisedProcess } from "./supervisor.js";

// Interface types
export type { ExecutionSupervisor, Logger, ServerClient } from "./types/index.js";

// Errors
export {
	AgentError,
	CapabilityDiscoveryError,
	ConfigurationError,
	ControlPlaneError,
	NotifyError,
	PollError,
	ProcessKillError,
	ProcessSpawnError,
} from "./errors/index.js";

// Dependency Injection
export {
	ContainerImpl,
	createContainer,
	createToken,
	createAgent,
	createAgentContainer,
	configureContainer,
	AGENT,
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	SERVER_CLIENT,
	SLEEP,
	SUPERVISOR,
	TOKENS,
} from "./di/index.js";
export type { Container, Factory, LoggerFactory, Token } from "./di/index.js";
