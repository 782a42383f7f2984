// =============================================================================
// Setting Keys
// =============================================================================

/**
 * Setting keys recognized by the configuration reader as a const object.
 * Use these constants instead of string literals for type safety.
 */
export const SETTING_KEY = {
	SERVER_URLS: "ServerUrls",
	SECRET_TOKEN: "SecretToken",
	CAPTURE_HEADERS: "CaptureHeaders",
	TRANSACTION_SAMPLE_RATE: "TransactionSampleRate",
	LOG_LEVEL: "LogLevel",
	METRICS_INTERVAL: "MetricsInterval",
	SPAN_FRAMES_MIN_DURATION: "SpanFramesMinDuration",
	STACK_TRACE_LIMIT: "StackTraceLimit",
	SERVICE_NAME: "ServiceName",
} as const;

/**
 * Name of one configuration item.
 */
export type SettingKey = (typeof SETTING_KEY)[keyof typeof SETTING_KEY];

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Severity levels ordered from most to least verbose.
 * `None` disables logging entirely.
 */
export const LOG_LEVELS = {
	Trace: 0,
	Debug: 1,
	Information: 2,
	Warning: 3,
	Error: 4,
	Critical: 5,
	None: 6,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Level names in enumeration order.
 */
export const LOG_LEVEL_NAMES: readonly LogLevel[] = ["Trace", "Debug", "Information", "Warning", "Error", "Critical", "None"];
