import type { LogLevel } from "./settings.js";

/**
 * One APM server endpoint.
 */
export interface ServerUrl {
	/** The trimmed text as it appeared in the source, used for identity comparisons */
	readonly original: string;
	/** Absolute form with a trailing path separator, used by the transport */
	readonly href: string;
}

/**
 * Fully resolved agent configuration.
 * Built once per resolution pass and frozen; every field always holds a valid value.
 */
export interface ResolvedConfiguration {
	/** Collector endpoints in source order, never empty */
	readonly serverUrls: readonly ServerUrl[];
	/** Token sent with every request, undefined when not configured */
	readonly secretToken: string | undefined;
	/** Whether HTTP headers are captured on transactions */
	readonly captureHeaders: boolean;
	/** Fraction of transactions that are sampled, within [0, 1] */
	readonly transactionSampleRate: number;
	/** Minimum level the agent logger writes */
	readonly logLevel: LogLevel;
	/** Metrics collection interval in milliseconds, 0 means disabled */
	readonly metricsIntervalMs: number;
	/** Spans shorter than this (in milliseconds) are captured without stack frames */
	readonly spanFramesMinDurationMs: number;
	/** Maximum number of stack frames captured per span */
	readonly stackTraceLimit: number;
	/** Service name reported to the collector, restricted to `[a-zA-Z0-9 _-]` */
	readonly serviceName: string;
}
