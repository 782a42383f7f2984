export { DEFAULT_LOG_LEVEL, isLevelEnabled, levelLabel } from "./log-level.js";
export { LoggerImpl, consoleSink, formatLogRecord } from "./logger-impl.js";
