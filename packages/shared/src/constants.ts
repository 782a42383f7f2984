/**
 * Shared constants for the agent packages.
 *
 * Constants are organized into domain-specific groups for easier discovery.
 */

import type { LogLevel, SettingKey } from "./types/settings.js";

// =============================================================================
// External Key Names
// =============================================================================

/** Prefix shared by every environment variable the agent reads */
export const ENV_VAR_PREFIX = "TRACE_AGENT_";

/**
 * Environment variable name for each setting.
 * These names are what diagnostics report as the setting's key.
 */
export const ENV_VAR_NAMES: Readonly<Record<SettingKey, string>> = {
	ServerUrls: `${ENV_VAR_PREFIX}SERVER_URLS`,
	SecretToken: `${ENV_VAR_PREFIX}SECRET_TOKEN`,
	CaptureHeaders: `${ENV_VAR_PREFIX}CAPTURE_HEADERS`,
	TransactionSampleRate: `${ENV_VAR_PREFIX}TRANSACTION_SAMPLE_RATE`,
	LogLevel: `${ENV_VAR_PREFIX}LOG_LEVEL`,
	MetricsInterval: `${ENV_VAR_PREFIX}METRICS_INTERVAL`,
	SpanFramesMinDuration: `${ENV_VAR_PREFIX}SPAN_FRAMES_MIN_DURATION`,
	StackTraceLimit: `${ENV_VAR_PREFIX}STACK_TRACE_LIMIT`,
	ServiceName: `${ENV_VAR_PREFIX}SERVICE_NAME`,
};

// =============================================================================
// Default Values
// =============================================================================

/**
 * Compiled-in defaults substituted whenever a setting is absent or invalid.
 */
export const DEFAULT_VALUES = {
	/** Collector endpoint used when no valid URL is configured */
	SERVER_URL: "http://localhost:8200",
	CAPTURE_HEADERS: true,
	TRANSACTION_SAMPLE_RATE: 1.0,
	LOG_LEVEL: "Error" satisfies LogLevel,
	/** Metrics interval literal, must parse to METRICS_INTERVAL_MS */
	METRICS_INTERVAL: "30s",
	METRICS_INTERVAL_MS: 30_000,
	/** Span frames threshold literal, must parse to SPAN_FRAMES_MIN_DURATION_MS */
	SPAN_FRAMES_MIN_DURATION: "5ms",
	SPAN_FRAMES_MIN_DURATION_MS: 5,
	STACK_TRACE_LIMIT: 50,
	/** Reported when no service name is configured or discovered */
	UNKNOWN_SERVICE_NAME: "unknown",
} as const;

// =============================================================================
// Policies
// =============================================================================

/** Metrics intervals below this many milliseconds disable metrics collection */
export const METRICS_INTERVAL_FLOOR_MS = 1_000;

/** Characters allowed in a reported service name */
export const SERVICE_NAME_PATTERN = /^[a-zA-Z0-9 _-]+$/;
