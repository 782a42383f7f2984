import type { SettingKey } from "@trace-agent/shared";

/**
 * Raw value read for one setting.
 */
export interface ConfigurationKeyValue {
	/** External key name, e.g. the environment variable name */
	readonly key: string;
	readonly value: string;
}

/**
 * Flat, read-only mapping from setting to raw string value.
 * Implementations take a snapshot on construction.
 */
export interface ConfigurationSource {
	/** Label naming where values come from, reported in diagnostics */
	readonly origin: string;
	/** Returns undefined when the setting is absent or blank. */
	read(setting: SettingKey): ConfigurationKeyValue | undefined;
}
