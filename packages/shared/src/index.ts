/**
 * Shared package public API
 */

export {
	DEFAULT_VALUES,
	ENV_VAR_NAMES,
	ENV_VAR_PREFIX,
	METRICS_INTERVAL_FLOOR_MS,
	SERVICE_NAME_PATTERN,
} from "./constants.js";
export { LOG_LEVEL_NAMES, LOG_LEVELS, SETTING_KEY } from "./types/settings.js";
export type { LogLevel, SettingKey } from "./types/settings.js";
export type { ResolvedConfiguration, ServerUrl } from "./types/configuration.js";
