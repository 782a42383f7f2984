import { afterEach, describe, expect, it, vi } from "vitest";
import { LOG_LEVEL_NAMES, LOG_LEVELS, type LogLevel } from "@trace-agent/shared";
import { LoggerImpl, formatLogRecord, isLevelEnabled } from "../logger/index.js";
import { createCapturingLogger } from "./test-utils.js";

describe("LoggerImpl", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("defaults to the Error level", () => {
		expect(new LoggerImpl("agent").level).toBe("Error");
	});

	it.each(LOG_LEVEL_NAMES.filter((level) => level !== "None"))("enables exactly the levels at or above %s", (threshold) => {
		const logger = new LoggerImpl("agent", threshold);

		for (const level of LOG_LEVEL_NAMES) {
			const expected = level !== "None" && LOG_LEVELS[level] >= LOG_LEVELS[threshold];
			expect(logger.isEnabled(level)).toBe(expected);
		}
	});

	it("writes nothing at level None", () => {
		const { logger, records } = createCapturingLogger("agent", "None");

		logger.critical("boom");

		expect(logger.isEnabled("Critical")).toBe(false);
		expect(records).toEqual([]);
	});

	it("maps each method to its level", () => {
		const { logger, records } = createCapturingLogger("agent", "Trace");

		logger.trace("t");
		logger.debug("d");
		logger.info("i");
		logger.warn("w");
		logger.error("e");
		logger.critical("c");

		const levels: LogLevel[] = ["Trace", "Debug", "Information", "Warning", "Error", "Critical"];
		expect(records.map((record) => record.level)).toEqual(levels);
		expect(records.map((record) => record.message)).toEqual(["t", "d", "i", "w", "e", "c"]);
		expect(records.every((record) => record.prefix === "agent")).toBe(true);
	});

	it("drops entries below its level", () => {
		const { logger, records } = createCapturingLogger("agent", "Warning");

		logger.info("hidden");
		logger.warn("shown");

		expect(records.map((record) => record.message)).toEqual(["shown"]);
	});

	it("keeps the structured error on the record", () => {
		const { logger, records } = createCapturingLogger("agent", "Trace");
		const cause = new Error("bad value");

		logger.error("failed", cause);
		logger.info("plain");

		expect(records[0]?.error).toBe(cause);
		expect(records[1]).not.toHaveProperty("error");
	});

	it("prints formatted lines to the console by default", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);

		new LoggerImpl("ConfigurationReader").error("Failed parsing");

		expect(spy).toHaveBeenCalledTimes(1);
		expect(spy.mock.calls[0]?.[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[ERROR\] \[ConfigurationReader\] Failed parsing$/);
	});
});

describe("formatLogRecord", () => {
	it("formats timestamp, padded level, prefix and message", () => {
		const line = formatLogRecord({
			timestamp: new Date("2024-05-01T10:00:00.000Z"),
			level: "Warning",
			prefix: "agent",
			message: "hello",
		});

		expect(line).toBe("[2024-05-01T10:00:00.000Z] [WARN ] [agent] hello");
	});
});

describe("isLevelEnabled", () => {
	it("never enables None", () => {
		expect(isLevelEnabled("Trace", "None")).toBe(false);
	});
});
