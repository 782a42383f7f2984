import { type ParseResult, type Parser, failure, success } from "./parse-result.js";

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const INTEGER = /^[+-]?\d+$/;

export const INT32_MIN = -2_147_483_648;
export const INT32_MAX = 2_147_483_647;

/**
 * Parses a floating point value written with a dot as decimal separator.
 * Comma decimals, exponents and hex literals are rejected regardless of locale.
 */
export function parseRate(raw: string): ParseResult<number> {
	const text = raw.trim();
	if (!DECIMAL.test(text)) {
		return failure(`"${text}" is not a decimal number with a dot separator`);
	}
	const value = Number(text);
	return success(value === 0 ? 0 : value);
}

/**
 * Parses a signed 32-bit decimal integer.
 */
export function parseInteger(raw: string): ParseResult<number> {
	const text = raw.trim();
	if (!INTEGER.test(text)) {
		return failure(`"${text}" is not an integer`);
	}
	const value = Number(text);
	if (value < INT32_MIN || value > INT32_MAX) {
		return failure(`${text} is outside the 32-bit integer range`);
	}
	return success(value === 0 ? 0 : value);
}

export const rateParser: Parser<number> = { kind: "rate", parse: parseRate };

export const integerParser: Parser<number> = { kind: "integer", parse: parseInteger };
