import type { SettingKey } from "@trace-agent/shared";
import { ConfigurationError } from "./configuration-error.js";

export interface SettingParseErrorDetails {
	setting: SettingKey;
	/** Human description of the setting, e.g. "log level" */
	description: string;
	origin: string;
	/** External key name the raw value was read from */
	key: string;
	rawValue: string;
	reason: string;
	/** Formatted value used instead, absent for dropped list elements */
	fallback?: string;
}

/**
 * Describes a raw value that could not be turned into a setting value.
 * Never thrown: resolution logs its message and substitutes the default.
 */
export class SettingParseError extends ConfigurationError {
	readonly setting: SettingKey;
	readonly key: string;
	readonly origin: string;
	readonly rawValue: string;
	readonly reason: string;
	readonly fallback: string | undefined;

	constructor(details: SettingParseErrorDetails) {
		super(`Failed parsing ${details.description} from ${details.origin}: ${details.key}, value: ${details.rawValue}, reason: ${details.reason}`);
		this.setting = details.setting;
		this.key = details.key;
		this.origin = details.origin;
		this.rawValue = details.rawValue;
		this.reason = details.reason;
		this.fallback = details.fallback;
	}
}
