/**
 * Shared test utilities for agent tests
 *
 * Provides:
 * - A logger that captures records instead of printing them
 * - Synthetic call chains for the default identity resolver
 * - Factories for readers over in-memory sources
 */

import { vi } from "vitest";
import type { LogLevel } from "@trace-agent/shared";
import type { CallChainInspector, CallFrame, LogRecord, Logger } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { ConfigurationReaderImpl } from "../config/configuration-reader.js";
import { InMemoryConfigurationSource, type SettingValues } from "../config/sources/index.js";
import { AGENT_PUBLISHER, RUNTIME_PUBLISHER, publisherTokenFor } from "../config/service-name/index.js";

// =============================================================================
// Logging
// =============================================================================

/** Tag used by readers created in tests */
export const TEST_READER_TAG = "TestConfigurationReader";

/** Origin label of sources created in tests */
export const TEST_ORIGIN = "unit test configuration";

/**
 * Logger writing into an in-memory list.
 */
export interface CapturingLogger {
	logger: Logger;
	records: LogRecord[];
	/** Messages of the captured records, in order */
	messages: () => string[];
}

/**
 * Creates a real LoggerImpl whose sink collects records.
 *
 * @param prefix - Component tag (default: TEST_READER_TAG)
 * @param level - Minimum level captured (default: "Trace", everything)
 */
export function createCapturingLogger(prefix = TEST_READER_TAG, level: LogLevel = "Trace"): CapturingLogger {
	const records: LogRecord[] = [];
	const logger = new LoggerImpl(prefix, level, (record) => {
		records.push(record);
	});
	return { logger, records, messages: () => records.map((record) => record.message) };
}

/**
 * Creates a mock Logger for testing.
 * All methods are no-op Vitest mocks that can be inspected.
 */
export function createMockLogger(): Logger {
	return {
		prefix: "mock",
		level: "Trace",
		isEnabled: vi.fn(() => true),
		trace: vi.fn(),
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		critical: vi.fn(),
	};
}

// =============================================================================
// Call Chains
// =============================================================================

export function createFrame(moduleName: string, publisher: string = moduleName): CallFrame {
	return { moduleName, publisherToken: publisherTokenFor(publisher) };
}

export function runtimeFrame(): CallFrame {
	return createFrame("node:internal", RUNTIME_PUBLISHER);
}

export function agentFrame(moduleName = "@trace-agent/agent"): CallFrame {
	return createFrame(moduleName, AGENT_PUBLISHER);
}

/**
 * Inspector returning a fixed call chain, innermost frame first.
 */
export function createFakeInspector(frames: readonly CallFrame[]): CallChainInspector {
	return { frames: vi.fn(() => frames) };
}

// =============================================================================
// Readers
// =============================================================================

export interface TestReaderContext {
	reader: ConfigurationReaderImpl;
	capture: CapturingLogger;
}

/**
 * Creates a reader over an in-memory source with a capturing logger.
 * The call chain defaults to agent frames followed by a "TestApp" module.
 */
export function createTestReader(
	values: SettingValues = {},
	inspector: CallChainInspector = createFakeInspector([agentFrame(), createFrame("TestApp")]),
): TestReaderContext {
	const capture = createCapturingLogger();
	const source = new InMemoryConfigurationSource(values, TEST_ORIGIN);
	const reader = new ConfigurationReaderImpl(source, capture.logger, inspector);
	return { reader, capture };
}
