/**
 * Agent configuration module.
 *
 * Resolves the agent's settings from a single flat source of string values
 * (the process environment by default) into a frozen ResolvedConfiguration.
 */

import type { ResolvedConfiguration } from "@trace-agent/shared";
import type { CallChainInspector, ConfigurationSource, Logger } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { resolveConfiguration } from "./configuration-reader.js";
import { EnvironmentConfigurationSource } from "./sources/index.js";

export { ConfigurationReaderImpl, resolveConfiguration } from "./configuration-reader.js";
export { ConfigurationError, SettingParseError, type SettingParseErrorDetails } from "./errors/index.js";
export { resolveSetting, type Setting } from "./setting.js";
export * as settings from "./settings.js";
export * from "./parsers/index.js";
export * from "./service-name/index.js";
export * from "./sources/index.js";

/**
 * Load the agent configuration, from the process environment unless another
 * source is given.
 */
export function loadConfig(
	source: ConfigurationSource = new EnvironmentConfigurationSource(),
	logger: Logger = new LoggerImpl("ConfigurationReader"),
	inspector?: CallChainInspector,
): ResolvedConfiguration {
	return resolveConfiguration(source, logger, inspector);
}
