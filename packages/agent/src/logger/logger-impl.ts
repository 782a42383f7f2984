import type { LogLevel } from "@trace-agent/shared";
import type { LogRecord, LogSink, Logger } from "../types/index.js";
import { DEFAULT_LOG_LEVEL, isLevelEnabled, levelLabel } from "./log-level.js";

/**
 * Formats a record as `[timestamp] [LEVEL] [prefix] message`.
 */
export function formatLogRecord(record: LogRecord): string {
	const levelStr = levelLabel(record.level).padEnd(5);
	return `[${record.timestamp.toISOString()}] [${levelStr}] [${record.prefix}] ${record.message}`;
}

export const consoleSink: LogSink = (record) => {
	console.log(formatLogRecord(record));
};

export class LoggerImpl implements Logger {
	constructor(
		readonly prefix: string,
		readonly level: LogLevel = DEFAULT_LOG_LEVEL,
		private readonly sink: LogSink = consoleSink,
	) {}

	isEnabled(level: LogLevel): boolean {
		return isLevelEnabled(this.level, level);
	}

	private log(level: LogLevel, message: string, error?: Error): void {
		if (!this.isEnabled(level)) {
			return;
		}
		const record: LogRecord = { timestamp: new Date(), level, prefix: this.prefix, message };
		if (error !== undefined) {
			record.error = error;
		}
		this.sink(record);
	}

	trace(message: string): void {
		this.log("Trace", message);
	}

	debug(message: string): void {
		this.log("Debug", message);
	}

	info(message: string): void {
		this.log("Information", message);
	}

	warn(message: string, error?: Error): void {
		this.log("Warning", message, error);
	}

	error(message: string, error?: Error): void {
		this.log("Error", message, error);
	}

	critical(message: string, error?: Error): void {
		this.log("Critical", message, error);
	}
}
