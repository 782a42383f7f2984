export { discoverServiceName } from "./default-identity.js";
export {
	AGENT_PUBLISHER,
	PUBLISHER_TOKEN_LENGTH,
	RUNTIME_PUBLISHER,
	TRUSTED_PUBLISHER_TOKENS,
	isTrustedPublisher,
	publisherOf,
	publisherTokenFor,
} from "./publisher-token.js";
export { sanitizeServiceName } from "./sanitizer.js";
export { StackCallChainInspector, publisherForFile } from "./stack-inspector.js";
