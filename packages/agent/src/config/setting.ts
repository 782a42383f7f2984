import type { SettingKey } from "@trace-agent/shared";
import type { ConfigurationSource, Logger } from "../types/index.js";
import { SettingParseError } from "./errors/index.js";
import type { Parser } from "./parsers/index.js";

/**
 * One named, typed, defaulted configuration item.
 */
export interface Setting<T> {
	key: SettingKey;
	/** Used in diagnostics: "Failed parsing <description> from ..." */
	description: string;
	defaultValue: T;
	parser: Parser<T>;
	/** Post-parse policy check; returns the reason when the value is rejected. */
	validate?: (value: T) => string | undefined;
	/** Renders the default in diagnostics, String() when omitted. */
	format?: (value: T) => string;
}

/**
 * Resolves one setting against a source.
 *
 * Absent values yield the default without logging. A parse or validation
 * failure logs exactly one error line and yields the default. Rejected
 * elements of a list are logged one line each while the valid ones are kept.
 */
export function resolveSetting<T>(setting: Setting<T>, source: ConfigurationSource, logger: Logger): T {
	const entry = source.read(setting.key);
	if (entry === undefined) {
		return setting.defaultValue;
	}

	const parsed = setting.parser.parse(entry.value);
	const reason = parsed.ok ? setting.validate?.(parsed.value) : parsed.reason;

	if (parsed.ok && reason === undefined) {
		for (const rejected of parsed.rejected ?? []) {
			const error = new SettingParseError({
				setting: setting.key,
				description: setting.description,
				origin: source.origin,
				key: entry.key,
				rawValue: rejected.value,
				reason: rejected.reason,
			});
			logger.error(`${error.message}. Skipping it`, error);
		}
		return parsed.value;
	}

	const formatted = setting.format ? setting.format(setting.defaultValue) : String(setting.defaultValue);
	const error = new SettingParseError({
		setting: setting.key,
		description: setting.description,
		origin: source.origin,
		key: entry.key,
		rawValue: entry.value,
		reason: reason ?? "invalid value",
		fallback: formatted,
	});
	logger.error(`${error.message}. Defaulting to ${formatted}`, error);
	return setting.defaultValue;
}
