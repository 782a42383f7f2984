/**
 * Comma separated lists of collector URLs.
 */

import type { ServerUrl } from "@trace-agent/shared";
import { type ParseResult, type Parser, type RejectedValue, failure, success } from "./parse-result.js";

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Builds a ServerUrl from one trimmed list entry.
 * The path of `href` always ends with a separator.
 */
export function parseServerUrl(text: string): ParseResult<ServerUrl> {
	if (!URL.canParse(text)) {
		return failure("not an absolute URL");
	}
	const url = new URL(text);
	if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
		return failure(`unsupported protocol ${url.protocol}`);
	}
	if (!url.pathname.endsWith("/")) {
		url.pathname = `${url.pathname}/`;
	}
	return success({ original: text, href: url.href });
}

/**
 * Parses every entry independently. Invalid entries are dropped and reported
 * in `rejected`; when none is valid the result is `[fallback]`.
 */
export function parseServerUrls(raw: string, fallback: ServerUrl): ParseResult<readonly ServerUrl[]> {
	const urls: ServerUrl[] = [];
	const rejected: RejectedValue[] = [];

	for (const piece of raw.split(",")) {
		const text = piece.trim();
		if (text === "") {
			continue;
		}
		const parsed = parseServerUrl(text);
		if (parsed.ok) {
			urls.push(parsed.value);
		} else {
			rejected.push({ value: text, reason: parsed.reason });
		}
	}

	return success(urls.length > 0 ? urls : [fallback], rejected);
}

export function urlListParser(fallback: ServerUrl): Parser<readonly ServerUrl[]> {
	return {
		kind: "url-list",
		parse: (raw) => parseServerUrls(raw, fallback),
	};
}
