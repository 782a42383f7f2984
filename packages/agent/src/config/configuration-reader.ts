import type { ResolvedConfiguration } from "@trace-agent/shared";
import type { CallChainInspector, ConfigurationReader, ConfigurationSource, Logger } from "../types/index.js";
import { resolveSetting } from "./setting.js";
import {
	CAPTURE_HEADERS,
	LOG_LEVEL,
	METRICS_INTERVAL,
	SECRET_TOKEN,
	SERVER_URLS,
	SERVICE_NAME,
	SPAN_FRAMES_MIN_DURATION,
	STACK_TRACE_LIMIT,
	TRANSACTION_SAMPLE_RATE,
} from "./settings.js";
import { StackCallChainInspector, discoverServiceName, sanitizeServiceName } from "./service-name/index.js";

/**
 * Resolves every setting of a source in one synchronous pass.
 *
 * Never throws for bad input: invalid values are logged through `logger` and
 * replaced by their defaults.
 */
export function resolveConfiguration(
	source: ConfigurationSource,
	logger: Logger,
	inspector: CallChainInspector = new StackCallChainInspector(),
): ResolvedConfiguration {
	const serverUrls = resolveSetting(SERVER_URLS, source, logger);

	return Object.freeze({
		serverUrls: Object.freeze(serverUrls.map((url) => Object.freeze({ ...url }))),
		secretToken: resolveSetting(SECRET_TOKEN, source, logger),
		captureHeaders: resolveSetting(CAPTURE_HEADERS, source, logger),
		transactionSampleRate: resolveSetting(TRANSACTION_SAMPLE_RATE, source, logger),
		logLevel: resolveSetting(LOG_LEVEL, source, logger),
		metricsIntervalMs: resolveSetting(METRICS_INTERVAL, source, logger),
		spanFramesMinDurationMs: resolveSetting(SPAN_FRAMES_MIN_DURATION, source, logger),
		stackTraceLimit: resolveSetting(STACK_TRACE_LIMIT, source, logger),
		serviceName: resolveServiceName(source, logger, inspector),
	});
}

function resolveServiceName(source: ConfigurationSource, logger: Logger, inspector: CallChainInspector): string {
	const configured = source.read(SERVICE_NAME.key) !== undefined;
	const name = configured ? resolveSetting(SERVICE_NAME, source, logger) : discoverServiceName(inspector);
	const sanitized = sanitizeServiceName(name);

	if (sanitized !== name) {
		logger.warn(`Service name "${name}" contains characters that are not allowed, using "${sanitized}" instead`);
	}
	if (!configured) {
		logger.debug(`No service name configured, using "${sanitized}" discovered from the call chain`);
	}
	return sanitized;
}

/**
 * Configuration reader that resolves its source eagerly on construction.
 */
export class ConfigurationReaderImpl implements ConfigurationReader {
	readonly origin: string;
	readonly configuration: ResolvedConfiguration;

	constructor(
		source: ConfigurationSource,
		readonly logger: Logger,
		inspector: CallChainInspector = new StackCallChainInspector(),
	) {
		this.origin = source.origin;
		this.configuration = resolveConfiguration(source, logger, inspector);
	}
}
