/**
 * Declarations of every setting the reader resolves.
 */

import {
	DEFAULT_VALUES,
	type LogLevel,
	METRICS_INTERVAL_FLOOR_MS,
	SETTING_KEY,
	type ServerUrl,
} from "@trace-agent/shared";
import type { Setting } from "./setting.js";
import {
	booleanParser,
	durationParser,
	integerParser,
	levelParser,
	rateParser,
	stringParser,
	urlListParser,
} from "./parsers/index.js";

export const DEFAULT_SERVER_URL: ServerUrl = Object.freeze({
	original: DEFAULT_VALUES.SERVER_URL,
	href: new URL(DEFAULT_VALUES.SERVER_URL).href,
});

export const SERVER_URLS: Setting<readonly ServerUrl[]> = {
	key: SETTING_KEY.SERVER_URLS,
	description: "server URL",
	defaultValue: Object.freeze([DEFAULT_SERVER_URL]),
	parser: urlListParser(DEFAULT_SERVER_URL),
	format: (urls) => urls.map((url) => url.href).join(","),
};

export const SECRET_TOKEN: Setting<string | undefined> = {
	key: SETTING_KEY.SECRET_TOKEN,
	description: "secret token",
	defaultValue: undefined,
	parser: stringParser,
};

export const CAPTURE_HEADERS: Setting<boolean> = {
	key: SETTING_KEY.CAPTURE_HEADERS,
	description: "capture headers",
	defaultValue: DEFAULT_VALUES.CAPTURE_HEADERS,
	parser: booleanParser,
};

export const TRANSACTION_SAMPLE_RATE: Setting<number> = {
	key: SETTING_KEY.TRANSACTION_SAMPLE_RATE,
	description: "transaction sample rate",
	defaultValue: DEFAULT_VALUES.TRANSACTION_SAMPLE_RATE,
	parser: rateParser,
	validate: (rate) => (rate < 0 || rate > 1 ? `${rate} is outside [0, 1]` : undefined),
};

export const LOG_LEVEL: Setting<LogLevel> = {
	key: SETTING_KEY.LOG_LEVEL,
	description: "log level",
	defaultValue: DEFAULT_VALUES.LOG_LEVEL,
	parser: levelParser,
};

export const METRICS_INTERVAL: Setting<number> = {
	key: SETTING_KEY.METRICS_INTERVAL,
	description: "metrics interval",
	defaultValue: DEFAULT_VALUES.METRICS_INTERVAL_MS,
	parser: durationParser({ defaultUnit: "s", floorMs: METRICS_INTERVAL_FLOOR_MS }),
	format: (ms) => `${ms}ms`,
};

export const SPAN_FRAMES_MIN_DURATION: Setting<number> = {
	key: SETTING_KEY.SPAN_FRAMES_MIN_DURATION,
	description: "span frames minimum duration",
	defaultValue: DEFAULT_VALUES.SPAN_FRAMES_MIN_DURATION_MS,
	parser: durationParser({ defaultUnit: "ms" }),
	format: (ms) => `${ms}ms`,
};

export const STACK_TRACE_LIMIT: Setting<number> = {
	key: SETTING_KEY.STACK_TRACE_LIMIT,
	description: "stack trace limit",
	defaultValue: DEFAULT_VALUES.STACK_TRACE_LIMIT,
	parser: integerParser,
};

/**
 * Explicit service name. The default is only a placeholder: when the setting
 * is absent the reader discovers a name from the call chain instead.
 */
export const SERVICE_NAME: Setting<string> = {
	key: SETTING_KEY.SERVICE_NAME,
	description: "service name",
	defaultValue: DEFAULT_VALUES.UNKNOWN_SERVICE_NAME,
	parser: stringParser,
};
