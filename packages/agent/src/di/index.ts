/**
 * Dependency Injection module exports.
 */

// Re-export reflect-metadata to ensure it's loaded
import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	AGENT,
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	SERVER_CLIENT,
	SLEEP,
	SUPERVISOR,
	TOKENS,
	createToken,
	type LoggerFactory,
	type Token,
} from "./tokens.js";
export { configureContainer, createAgent, createAgentContainer } from "./composition-root.js";
