/**
 * Dependency Injection module exports.
 */

import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	CALL_CHAIN_INSPECTOR,
	CONFIGURATION,
	CONFIGURATION_READER,
	CONFIGURATION_SOURCE,
	LOGGER,
	LOGGER_FACTORY,
	TOKENS,
	createToken,
	type LoggerFactory,
	type Token,
} from "./tokens.js";
export {
	CONFIGURATION_READER_TAG,
	configureContainer,
	createAgentContainer,
} from "./composition-root.js";
