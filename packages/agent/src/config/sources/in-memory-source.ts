import { ENV_VAR_NAMES, type SettingKey } from "@trace-agent/shared";
import type { ConfigurationKeyValue, ConfigurationSource } from "../../types/index.js";

export type SettingValues = Partial<Record<SettingKey, string>>;

/**
 * Source backed by a plain object keyed by setting name.
 * Reports the same external key names as the environment source.
 */
export class InMemoryConfigurationSource implements ConfigurationSource {
	private readonly values: Readonly<SettingValues>;

	constructor(values: SettingValues = {}, readonly origin: string = "in-memory configuration") {
		this.values = { ...values };
	}

	read(setting: SettingKey): ConfigurationKeyValue | undefined {
		const value = this.values[setting];
		if (value === undefined || value.trim() === "") {
			return undefined;
		}
		return { key: ENV_VAR_NAMES[setting], value };
	}
}
