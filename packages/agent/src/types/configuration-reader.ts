import type { ResolvedConfiguration } from "@trace-agent/shared";
import type { Logger } from "./logger.js";

/**
 * Result of one resolution pass over a configuration source.
 */
export interface ConfigurationReader {
	/** Origin label of the source this reader resolved */
	readonly origin: string;
	/** Logger that received every diagnostic of the pass */
	readonly logger: Logger;
	readonly configuration: ResolvedConfiguration;
}
