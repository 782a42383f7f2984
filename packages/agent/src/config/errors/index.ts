export { ConfigurationError } from "./configuration-error.js";
export { SettingParseError, type SettingParseErrorDetails } from "./setting-parse-error.js";
