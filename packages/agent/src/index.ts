/**
 * Agent package public API
 *
 * Configuration resolution, logging and the dependency injection wiring.
 */

// Configuration
export {
	ConfigurationError,
	ConfigurationReaderImpl,
	EnvironmentConfigurationSource,
	InMemoryConfigurationSource,
	SettingParseError,
	StackCallChainInspector,
	discoverServiceName,
	isTrustedPublisher,
	loadConfig,
	parseBoolean,
	parseDuration,
	parseInteger,
	parseLogLevel,
	parseRate,
	parseServerUrls,
	publisherTokenFor,
	resolveConfiguration,
	resolveSetting,
	sanitizeServiceName,
	settings,
} from "./config/index.js";
export type { DurationOptions, ParseResult, Parser, ParserKind, Setting, SettingValues } from "./config/index.js";

// Logging
export { LoggerImpl, consoleSink, formatLogRecord } from "./logger/index.js";

// Interface types
export type {
	CallChainInspector,
	CallFrame,
	ConfigurationKeyValue,
	ConfigurationReader,
	ConfigurationSource,
	LogRecord,
	LogSink,
	Logger,
	PublisherToken,
} from "./types/index.js";

// Dependency Injection
export {
	CALL_CHAIN_INSPECTOR,
	CONFIGURATION,
	CONFIGURATION_READER,
	CONFIGURATION_READER_TAG,
	CONFIGURATION_SOURCE,
	ContainerImpl,
	LOGGER,
	LOGGER_FACTORY,
	TOKENS,
	configureContainer,
	createAgentContainer,
	createContainer,
	createToken,
} from "./di/index.js";
export type { Container, Factory, LoggerFactory, Token } from "./di/index.js";
