import { LOG_LEVEL_NAMES, type LogLevel } from "@trace-agent/shared";
import { type ParseResult, type Parser, failure, success } from "./parse-result.js";

/**
 * Case-insensitive match against the log level enumeration.
 * Returns the canonical level name.
 */
export function parseLogLevel(raw: string): ParseResult<LogLevel> {
	const text = raw.trim().toLowerCase();
	const level = LOG_LEVEL_NAMES.find((name) => name.toLowerCase() === text);
	if (level === undefined) {
		return failure(`unknown log level, expected one of ${LOG_LEVEL_NAMES.join(", ")}`);
	}
	return success(level);
}

export function parseBoolean(raw: string): ParseResult<boolean> {
	switch (raw.trim().toLowerCase()) {
		case "true":
			return success(true);
		case "false":
			return success(false);
		default:
			return failure("expected true or false");
	}
}

export const levelParser: Parser<LogLevel> = { kind: "level", parse: parseLogLevel };

export const booleanParser: Parser<boolean> = { kind: "boolean", parse: parseBoolean };

/**
 * Passes the raw value through unchanged.
 */
export const stringParser: Parser<string> = { kind: "string", parse: (raw) => success(raw) };
