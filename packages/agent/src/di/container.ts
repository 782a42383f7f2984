/**
 * Dependency injection container backed by inversify.
 */

import "reflect-metadata";
import { Container as InversifyContainer } from "inversify";
import type { Token } from "./tokens.js";

export type Factory<T> = (container: Container) => T;

export interface Container {
	/** The factory runs once; every resolution returns that instance. */
	singleton<T>(token: Token<T>, factory: Factory<T>): void;

	/** The factory runs on every resolution. */
	transient<T>(token: Token<T>, factory: Factory<T>): void;

	instance<T>(token: Token<T>, value: T): void;

	/**
	 * @throws Error if nothing is registered for the token here or in a parent.
	 */
	resolve<T>(token: Token<T>): T;

	has<T>(token: Token<T>): boolean;

	/**
	 * Child containers see the parent's registrations and may override them,
	 * e.g. to resolve a second configuration source next to the first.
	 */
	createChild(): Container;
}

export class ContainerImpl implements Container {
	private readonly inversifyContainer: InversifyContainer;

	constructor(parent?: InversifyContainer) {
		this.inversifyContainer = new InversifyContainer({
			defaultScope: "Singleton",
			parent,
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
