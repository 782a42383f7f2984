import { describe, expect, it } from "vitest";
import { SETTING_KEY } from "@trace-agent/shared";
import { resolveSetting, type Setting } from "../config/setting.js";
import { durationParser, integerParser } from "../config/parsers/index.js";
import { InMemoryConfigurationSource } from "../config/sources/index.js";
import { SettingParseError } from "../config/errors/index.js";
import { SERVER_URLS, TRANSACTION_SAMPLE_RATE } from "../config/settings.js";
import { TEST_ORIGIN, createCapturingLogger, createMockLogger } from "./test-utils.js";

const STACK_TRACE_LIMIT: Setting<number> = {
	key: SETTING_KEY.STACK_TRACE_LIMIT,
	description: "stack trace limit",
	defaultValue: 50,
	parser: integerParser,
};

describe("resolveSetting", () => {
	it("returns the parsed value without logging", () => {
		const logger = createMockLogger();
		const source = new InMemoryConfigurationSource({ StackTraceLimit: "12" });

		expect(resolveSetting(STACK_TRACE_LIMIT, source, logger)).toBe(12);
		expect(logger.error).not.toHaveBeenCalled();
	});

	it("returns the default silently when the setting is absent", () => {
		const logger = createMockLogger();

		expect(resolveSetting(STACK_TRACE_LIMIT, new InMemoryConfigurationSource(), logger)).toBe(50);
		expect(logger.error).not.toHaveBeenCalled();
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it("treats blank values as absent", () => {
		const logger = createMockLogger();
		const source = new InMemoryConfigurationSource({ StackTraceLimit: "  " });

		expect(resolveSetting(STACK_TRACE_LIMIT, source, logger)).toBe(50);
		expect(logger.error).not.toHaveBeenCalled();
	});

	it("logs one line with origin, key, value and default on a parse failure", () => {
		const { logger, records } = createCapturingLogger();
		const source = new InMemoryConfigurationSource({ StackTraceLimit: "asdf" }, TEST_ORIGIN);

		expect(resolveSetting(STACK_TRACE_LIMIT, source, logger)).toBe(50);
		expect(records).toHaveLength(1);
		expect(records[0]?.level).toBe("Error");
		expect(records[0]?.prefix).toBe("TestConfigurationReader");
		expect(records[0]?.message).toBe(
			"Failed parsing stack trace limit from unit test configuration: TRACE_AGENT_STACK_TRACE_LIMIT, "
			+ "value: asdf, reason: \"asdf\" is not an integer. Defaulting to 50",
		);
	});

	it("treats a failed validation like a parse failure", () => {
		const { logger, messages } = createCapturingLogger();
		const source = new InMemoryConfigurationSource({ TransactionSampleRate: "1.5" }, TEST_ORIGIN);

		expect(resolveSetting(TRANSACTION_SAMPLE_RATE, source, logger)).toBe(1);
		expect(messages()).toEqual([
			"Failed parsing transaction sample rate from unit test configuration: TRACE_AGENT_TRANSACTION_SAMPLE_RATE, "
			+ "value: 1.5, reason: 1.5 is outside [0, 1]. Defaulting to 1",
		]);
	});

	it("uses the setting's formatter for the default", () => {
		const { logger, messages } = createCapturingLogger();
		const setting: Setting<number> = {
			key: SETTING_KEY.METRICS_INTERVAL,
			description: "metrics interval",
			defaultValue: 30_000,
			parser: durationParser(),
			format: (ms) => `${ms}ms`,
		};
		const source = new InMemoryConfigurationSource({ MetricsInterval: "1h" }, TEST_ORIGIN);

		expect(resolveSetting(setting, source, logger)).toBe(30_000);
		expect(messages()[0]).toMatch(/\. Defaulting to 30000ms$/);
	});

	it("logs every rejected list element and keeps the valid ones", () => {
		const { logger, messages } = createCapturingLogger();
		const source = new InMemoryConfigurationSource({ ServerUrls: "http://a:1,invalidUrl,http://b:2,other" }, TEST_ORIGIN);

		const urls = resolveSetting(SERVER_URLS, source, logger);

		expect(urls.map((url) => url.original)).toEqual(["http://a:1", "http://b:2"]);
		expect(messages()).toEqual([
			"Failed parsing server URL from unit test configuration: TRACE_AGENT_SERVER_URLS, "
			+ "value: invalidUrl, reason: not an absolute URL. Skipping it",
			"Failed parsing server URL from unit test configuration: TRACE_AGENT_SERVER_URLS, "
			+ "value: other, reason: not an absolute URL. Skipping it",
		]);
	});
});

describe("resolveSetting diagnostics", () => {
	it("attaches the parse error with the fallback to the log record", () => {
		const { logger, records } = createCapturingLogger();
		const source = new InMemoryConfigurationSource({ StackTraceLimit: "2,32" }, TEST_ORIGIN);

		resolveSetting(STACK_TRACE_LIMIT, source, logger);

		const error = records[0]?.error;
		expect(error).toBeInstanceOf(SettingParseError);
		expect(error).toMatchObject({
			setting: "StackTraceLimit",
			key: "TRACE_AGENT_STACK_TRACE_LIMIT",
			origin: TEST_ORIGIN,
			rawValue: "2,32",
			reason: "\"2,32\" is not an integer",
			fallback: "50",
		});
	});

	it("attaches one error per rejected list element, without a fallback", () => {
		const { logger, records } = createCapturingLogger();
		const source = new InMemoryConfigurationSource({ ServerUrls: "http://a:1,invalidUrl" }, TEST_ORIGIN);

		resolveSetting(SERVER_URLS, source, logger);

		expect(records).toHaveLength(1);
		expect(records[0]?.error).toMatchObject({ rawValue: "invalidUrl", reason: "not an absolute URL", fallback: undefined });
	});
});

describe("SettingParseError", () => {
	it("carries the failing setting and composes the diagnostic message", () => {
		const error = new SettingParseError({
			setting: SETTING_KEY.LOG_LEVEL,
			description: "log level",
			origin: "environment variables",
			key: "TRACE_AGENT_LOG_LEVEL",
			rawValue: "Loud",
			reason: "unknown log level",
		});

		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe("SettingParseError");
		expect(error.setting).toBe("LogLevel");
		expect(error.rawValue).toBe("Loud");
		expect(error.message).toBe(
			"Failed parsing log level from environment variables: TRACE_AGENT_LOG_LEVEL, value: Loud, reason: unknown log level",
		);
	});
});
