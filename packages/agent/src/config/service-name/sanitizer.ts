import { DEFAULT_VALUES } from "@trace-agent/shared";

const FORBIDDEN = /[^a-zA-Z0-9 _-]/gu;

/**
 * Repairs a service name so it only contains `[a-zA-Z0-9 _-]`.
 * Dots and every other forbidden character become `_`; an empty name
 * becomes the unknown-service sentinel.
 */
export function sanitizeServiceName(name: string): string {
	const sanitized = name.replaceAll(".", "_").replace(FORBIDDEN, "_");
	return sanitized === "" ? DEFAULT_VALUES.UNKNOWN_SERVICE_NAME : sanitized;
}
