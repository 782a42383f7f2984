import { ENV_VAR_NAMES, type SettingKey } from "@trace-agent/shared";
import type { ConfigurationKeyValue, ConfigurationSource } from "../../types/index.js";

/**
 * Reads settings from environment variables named in ENV_VAR_NAMES.
 * The environment is copied on construction, so later changes to
 * `process.env` do not affect this source.
 */
export class EnvironmentConfigurationSource implements ConfigurationSource {
	readonly origin = "environment variables";
	private readonly snapshot: Readonly<Record<string, string | undefined>>;

	constructor(env: NodeJS.ProcessEnv = process.env) {
		this.snapshot = { ...env };
	}

	read(setting: SettingKey): ConfigurationKeyValue | undefined {
		const key = ENV_VAR_NAMES[setting];
		const value = this.snapshot[key];
		if (value === undefined || value.trim() === "") {
			return undefined;
		}
		return { key, value };
	}
}
