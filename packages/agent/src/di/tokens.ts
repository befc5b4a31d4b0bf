/**
 * Injection tokens (identifiers) for all dependencies in the agent package.
 * Uses inversify-style Symbol identifiers for type-safe dependency injection.
 */

import type {
	Agent,
	AgentConfig,
	ExecutionSupervisor,
	Logger,
	ServerClient,
} from "../types/index.js";
import type { SleepFn } from "../utils/index.js";

/**
 * Token type for identifying dependencies in the container.
 * Using symbols ensures type safety and avoids string collision.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

/**
 * Factory for loggers carrying a component prefix.
 */
export type LoggerFactory = (prefix: string) => Logger;

// ============================================================================
// Configuration
// ============================================================================

export const CONFIG = createToken<AgentConfig>("AgentConfig");

// ============================================================================
// Core Services
// ============================================================================

export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

/**
 * Token for the agent loop's own logger.
 */
export const LOGGER = createToken<Logger>("Logger");

export const SERVER_CLIENT = createToken<ServerClient>("ServerClient");

export const SUPERVISOR = createToken<ExecutionSupervisor>("ExecutionSupervisor");

/**
 * Token for the idle sleep used between empty polls.
 */
export const SLEEP = createToken<SleepFn>("Sleep");

// ============================================================================
// Agent
// ============================================================================

export const AGENT = createToken<Agent>("Agent");

export const TOKENS = {
	CONFIG,
	LOGGER_FACTORY,
	LOGGER,
	SERVER_CLIENT,
	SUPERVISOR,
	SLEEP,
	AGENT,
} as const;
