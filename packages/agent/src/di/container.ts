/**
 * Dependency Injection container implementation using inversify.
 */

import "reflect-metadata";
import { Container as InversifyContainer } from "inversify";
import type { Token } from "./tokens.js";

/**
 * Factory function type for creating instances.
 */
export type Factory<T> = (container: Container) => T;

/**
 * Container interface for dependency injection.
 */
export interface Container {
	/**
	 * Register a dependency whose factory runs once.
	 */
	singleton<T>(token: Token<T>, factory: Factory<T>): void;

	/**
	 * Register a dependency whose factory runs on every resolution.
	 */
	transient<T>(token: Token<T>, factory: Factory<T>): void;

	/**
	 * Register a pre-created value.
	 */
	instance<T>(token: Token<T>, value: T): void;

	/**
	 * @throws Error if the token is not registered.
	 */
	resolve<T>(token: Token<T>): T;

	has<T>(token: Token<T>): boolean;

	/**
	 * Create a child container that falls back to this one,
	 * e.g. to swap a collaborator in tests.
	 */
	createChild(): Container;
}

/**
 * Inversify-based DI container implementation.
 */
export class ContainerImpl implements Container {
	private readonly inversifyContainer: InversifyContainer;

	constructor(parentContainer?: InversifyContainer) {
		this.inversifyContainer = new InversifyContainer({
			defaultScope: "Singleton",
			...(parentContainer ? { parent: parentContainer } : {}),
		});
	}

	singleton<T>(token: Token<T>, factory: Factory<T>): void {
		this.inversifyContainer
			.bind<T>(token)
			.toDynamicValue(() => factory(this))
			.inSingletonScope();
	}

	transient<T>(token: Token<T>, factory: Factory<T>): void {
		this.inversifyContainer
			.bind<T>(token)
			.toDynamicValue(() => factory(this))
			.inTransientScope();
	}

	instance<T>(token: Token<T>, value: T): void {
		this.inversifyContainer.bind<T>(token).toConstantValue(value);
	}

	resolve<T>(token: Token<T>): T {
		if (!this.has(token)) {
			throw new Error(`No registration found for token: ${token.toString()}`);
		}
		return this.inversifyContainer.get<T>(token);
	}

	has<T>(token: Token<T>): boolean {
		return this.inversifyContainer.isBound(token);
	}

	createChild(): Container {
		return new ContainerImpl(this.inversifyContainer);
	}
}

export function createContainer(): Container {
	return new ContainerImpl();
}
