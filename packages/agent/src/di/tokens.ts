/**
 * Injection tokens for every dependency of the agent package.
 */

import type { LogLevel, ResolvedConfiguration } from "@trace-agent/shared";
import type {
	CallChainInspector,
	ConfigurationReader,
	ConfigurationSource,
	Logger,
} from "../types/index.js";

/**
 * Symbol identifier carrying the type it resolves to.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Symbol.for keeps tokens identical across module instances.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration
// ============================================================================

/** Raw settings the reader resolves */
export const CONFIGURATION_SOURCE = createToken<ConfigurationSource>("ConfigurationSource");

/** Supplies the call chain used to discover a default service name */
export const CALL_CHAIN_INSPECTOR = createToken<CallChainInspector>("CallChainInspector");

export const CONFIGURATION_READER = createToken<ConfigurationReader>("ConfigurationReader");

/** The resolved, frozen configuration */
export const CONFIGURATION = createToken<ResolvedConfiguration>("ResolvedConfiguration");

// ============================================================================
// Logging
// ============================================================================

/**
 * Creates a logger for a component tag, at the given level or the default one.
 */
export type LoggerFactory = (prefix: string, level?: LogLevel) => Logger;
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

/** Agent logger, at the resolved log level */
export const LOGGER = createToken<Logger>("Logger");

export const TOKENS = {
	CONFIGURATION_SOURCE,
	CALL_CHAIN_INSPECTOR,
	CONFIGURATION_READER,
	CONFIGURATION,
	LOGGER_FACTORY,
	LOGGER,
} as const;
