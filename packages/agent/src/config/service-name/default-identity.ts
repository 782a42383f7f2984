import { DEFAULT_VALUES } from "@trace-agent/shared";
import type { CallChainInspector } from "../../types/index.js";
import { isTrustedPublisher } from "./publisher-token.js";

/**
 * Name of the first module in the call chain that is not published by the
 * runtime or the agent, or the unknown-service sentinel when there is none.
 * The result is not sanitized.
 */
export function discoverServiceName(inspector: CallChainInspector): string {
	const foreign = inspector.frames().find((frame) => !isTrustedPublisher(frame.publisherToken));
	return foreign?.moduleName ?? DEFAULT_VALUES.UNKNOWN_SERVICE_NAME;
}
