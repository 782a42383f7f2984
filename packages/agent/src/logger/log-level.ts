import { DEFAULT_VALUES, LOG_LEVELS, type LogLevel } from "@trace-agent/shared";

/**
 * Level used by loggers created without an explicit level.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = DEFAULT_VALUES.LOG_LEVEL;

const LEVEL_LABELS: Record<LogLevel, string> = {
	Trace: "TRACE",
	Debug: "DEBUG",
	Information: "INFO",
	Warning: "WARN",
	Error: "ERROR",
	Critical: "CRIT",
	None: "NONE",
};

/**
 * Whether a logger configured at `threshold` writes entries at `level`.
 */
export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
	if (level === "None") {
		return false;
	}
	return LOG_LEVELS[level] >= LOG_LEVELS[threshold];
}

export function levelLabel(level: LogLevel): string {
	return LEVEL_LABELS[level];
}
