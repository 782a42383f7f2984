/**
 * Publisher tokens identify who ships a code module. Frames published by the
 * runtime or by the agent itself are trusted and skipped when looking for the
 * application that loaded the agent.
 */

import { createHash } from "node:crypto";
import type { PublisherToken } from "../../types/index.js";

export const PUBLISHER_TOKEN_LENGTH = 8;

/** Publisher of runtime-internal and native frames */
export const RUNTIME_PUBLISHER = "node";

/** npm scope of the agent's own packages */
export const AGENT_PUBLISHER = "@trace-agent";

/**
 * First eight bytes of the SHA-256 digest of the publisher name.
 */
export function publisherTokenFor(publisher: string): PublisherToken {
	return Uint8Array.from(createHash("sha256").update(publisher).digest().subarray(0, PUBLISHER_TOKEN_LENGTH));
}

/**
 * Publisher of an npm package: its scope, or the package name when unscoped.
 */
export function publisherOf(packageName: string): string {
	if (packageName.startsWith("@")) {
		const slash = packageName.indexOf("/");
		return slash === -1 ? packageName : packageName.slice(0, slash);
	}
	return packageName;
}

export const TRUSTED_PUBLISHER_TOKENS: readonly PublisherToken[] = [
	publisherTokenFor(RUNTIME_PUBLISHER),
	publisherTokenFor(AGENT_PUBLISHER),
];

/**
 * Exact byte-for-byte match against one of the trusted tokens.
 * Tokens of any other length are never trusted.
 */
export function isTrustedPublisher(token: Uint8Array): boolean {
	if (token.length !== PUBLISHER_TOKEN_LENGTH) {
		return false;
	}
	return TRUSTED_PUBLISHER_TOKENS.some((trusted) => trusted.every((byte, index) => token[index] === byte));
}
