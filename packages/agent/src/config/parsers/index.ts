/**
 * Primitive parsers: stateless conversions from a raw string to a typed value.
 */

export {
	DURATION_UNIT_FACTORS,
	type DurationOptions,
	type DurationUnit,
	durationParser,
	parseDuration,
} from "./duration.js";
export { INT32_MAX, INT32_MIN, integerParser, parseInteger, parseRate, rateParser } from "./numbers.js";
export { booleanParser, levelParser, parseBoolean, parseLogLevel, stringParser } from "./text.js";
export { parseServerUrl, parseServerUrls, urlListParser } from "./url-list.js";
export {
	type ParseResult,
	type Parser,
	type ParserKind,
	type RejectedValue,
	failure,
	success,
} from "./parse-result.js";
