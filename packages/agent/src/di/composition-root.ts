/**
 * Composition root for the agent package.
 */

import "reflect-metadata";
import type { LogLevel } from "@trace-agent/shared";
import type { ConfigurationSource } from "../types/index.js";
import { ConfigurationReaderImpl } from "../config/configuration-reader.js";
import { EnvironmentConfigurationSource } from "../config/sources/index.js";
import { StackCallChainInspector } from "../config/service-name/index.js";
import { LoggerImpl } from "../logger/index.js";
import { type Container, createContainer } from "./container.js";
import {
	CALL_CHAIN_INSPECTOR,
	CONFIGURATION,
	CONFIGURATION_READER,
	CONFIGURATION_SOURCE,
	LOGGER,
	LOGGER_FACTORY,
	type LoggerFactory,
} from "./tokens.js";

/** Logger tag of the configuration reader's diagnostics */
export const CONFIGURATION_READER_TAG = "ConfigurationReader";

/**
 * Register every dependency. Registrations made before this call are kept,
 * so tests can supply their own logger factory or call chain inspector.
 */
export function configureContainer(container: Container, source: ConfigurationSource): void {
	container.instance(CONFIGURATION_SOURCE, source);

	if (!container.has(LOGGER_FACTORY)) {
		container.singleton<LoggerFactory>(LOGGER_FACTORY, () => {
			return (prefix: string, level?: LogLevel) => new LoggerImpl(prefix, level);
		});
	}

	if (!container.has(CALL_CHAIN_INSPECTOR)) {
		container.singleton(CALL_CHAIN_INSPECTOR, () => new StackCallChainInspector());
	}

	container.singleton(CONFIGURATION_READER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return new ConfigurationReaderImpl(
			c.resolve(CONFIGURATION_SOURCE),
			factory(CONFIGURATION_READER_TAG),
			c.resolve(CALL_CHAIN_INSPECTOR),
		);
	});

	container.singleton(CONFIGURATION, (c: Container) => c.resolve(CONFIGURATION_READER).configuration);

	container.singleton(LOGGER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return factory("agent", c.resolve(CONFIGURATION).logLevel);
	});
}

/**
 * Create and configure a container reading from `source`, the process
 * environment by default.
 */
export function createAgentContainer(source: ConfigurationSource = new EnvironmentConfigurationSource()): Container {
	const container = createContainer();
	configureContainer(container, source);
	return container;
}
