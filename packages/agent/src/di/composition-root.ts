/**
 * Composition root for the agent package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import type { Agent, AgentConfig } from "../types/index.js";
import { AgentImpl } from "../agent.js";
import { LoggerImpl } from "../logger/index.js";
import { ServerClientImpl } from "../server-client.js";
import { ExecutionSupervisorImpl } from "../supervisor.js";
import { sleep } from "../utils/index.js";
import { type Container, createContainer } from "./container.js";
import {
	AGENT,
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	type LoggerFactory,
	SERVER_CLIENT,
	SLEEP,
	SUPERVISOR,
} from "./tokens.js";

/**
 * Configure all dependencies in the container.
 * This is the single place where all wiring happens.
 */
export function configureContainer(container: Container, config: AgentConfig): void {
	container.instance(CONFIG, config);

	container.singleton<LoggerFactory>(LOGGER_FACTORY, () => {
		return (prefix: string) => new LoggerImpl(prefix);
	});

	container.singleton(LOGGER, (c: Container) => c.resolve(LOGGER_FACTORY)("agent"));

	container.singleton(SERVER_CLIENT, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return new ServerClientImpl(c.resolve(CONFIG), factory("server-client"));
	});

	container.singleton(SUPERVISOR, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return new ExecutionSupervisorImpl(c.resolve(CONFIG), factory("supervisor"));
	});

	container.instance(SLEEP, sleep);

	container.singleton(AGENT, (c: Container) => {
		return new AgentImpl(
			c.resolve(CONFIG),
			c.resolve(LOGGER),
			c.resolve(SERVER_CLIENT),
			c.resolve(SUPERVISOR),
			c.resolve(SLEEP),
		);
	});
}

/**
 * Create and configure a container with all dependencies for the given config.
 */
export function createAgentContainer(config: AgentConfig): Container {
	const container = createContainer();
	configureContainer(container, config);
	return container;
}

/**
 * Create and return the agent from a fully configured container.
 */
export function createAgent(config: AgentConfig): Agent {
	return createAgentContainer(config).resolve(AGENT);
}
