import type { LogLevel } from "@trace-agent/shared";

/**
 * One emitted log entry, before formatting.
 */
export interface LogRecord {
	timestamp: Date;
	level: LogLevel;
	/** Tag of the component that wrote the entry */
	prefix: string;
	message: string;
	/** Structured cause, e.g. the SettingParseError behind a fallback notice */
	error?: Error;
}

/**
 * Destination for log records that passed the level check.
 */
export type LogSink = (record: LogRecord) => void;

/**
 * Leveled logger scoped to one component.
 */
export interface Logger {
	readonly prefix: string;
	readonly level: LogLevel;
	isEnabled(level: LogLevel): boolean;
	trace(message: string): void;
	debug(message: string): void;
	info(message: string): void;
	warn(message: string, error?: Error): void;
	error(message: string, error?: Error): void;
	critical(message: string, error?: Error): void;
}
