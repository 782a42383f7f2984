export { EnvironmentConfigurationSource } from "./environment-source.js";
export { InMemoryConfigurationSource, type SettingValues } from "./in-memory-source.js";
