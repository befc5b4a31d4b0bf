import { AgentError } from "./agent-error.js";

/**
 * Thrown when a required setting is missing or unusable
 */
export class ConfigurationError extends AgentError {}
