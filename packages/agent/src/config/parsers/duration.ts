/**
 * Duration literals: a signed decimal with an optional `ms`, `s` or `m` suffix.
 */

import { type ParseResult, type Parser, failure, success } from "./parse-result.js";

export type DurationUnit = "ms" | "s" | "m";

export const DURATION_UNIT_FACTORS: Readonly<Record<DurationUnit, number>> = {
	ms: 1,
	s: 1_000,
	m: 60_000,
};

export interface DurationOptions {
	/** Unit applied when the literal has no suffix (default "s") */
	defaultUnit?: DurationUnit;
	/** Positive results below this many milliseconds collapse to 0 */
	floorMs?: number;
}

const NUMBER_PART = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)/;

function isDurationUnit(value: string): value is DurationUnit {
	return value === "ms" || value === "s" || value === "m";
}

/**
 * Parses a duration literal into whole milliseconds.
 * Negative results become 0.
 */
export function parseDuration(raw: string, options: DurationOptions = {}): ParseResult<number> {
	const text = raw.trim();
	const match = NUMBER_PART.exec(text);
	if (!match) {
		return failure(`"${text}" does not start with a number`);
	}

	const suffix = text.slice(match[0].length).toLowerCase();
	const unit = suffix === "" ? (options.defaultUnit ?? "s") : suffix;
	if (!isDurationUnit(unit)) {
		return failure(`unsupported duration unit "${suffix}", expected ms, s or m`);
	}

	const amount = Number(match[0]);
	const milliseconds = Math.max(0, Math.round(amount * DURATION_UNIT_FACTORS[unit]));
	if (!Number.isSafeInteger(milliseconds)) {
		return failure(`${text} does not fit in a whole number of milliseconds`);
	}
	if (options.floorMs !== undefined && milliseconds < options.floorMs) {
		return success(0);
	}
	return success(milliseconds);
}

export function durationParser(options: DurationOptions = {}): Parser<number> {
	return {
		kind: "duration",
		parse: (raw) => parseDuration(raw, options),
	};
}
