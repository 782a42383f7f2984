/**
 * Element of a multi-value setting that was dropped while parsing.
 */
export interface RejectedValue {
	value: string;
	reason: string;
}

export type ParseResult<T> =
	| { ok: true; value: T; rejected?: readonly RejectedValue[] }
	| { ok: false; reason: string };

/**
 * The closed set of parser variants a setting can declare.
 */
export type ParserKind = "duration" | "rate" | "integer" | "level" | "boolean" | "url-list" | "string";

export interface Parser<T> {
	readonly kind: ParserKind;
	/** Pure and total: never throws. */
	parse(raw: string): ParseResult<T>;
}

export function success<T>(value: T, rejected?: readonly RejectedValue[]): ParseResult<T> {
	return rejected === undefined || rejected.length === 0 ? { ok: true, value } : { ok: true, value, rejected };
}

export function failure<T>(reason: string): ParseResult<T> {
	return { ok: false, reason };
}
