/**
 * Type definitions for the agent package.
 */
export type { CallChainInspector, CallFrame, PublisherToken } from "./call-chain-inspector.js";
export type { ConfigurationKeyValue, ConfigurationSource } from "./configuration-source.js";
export type { ConfigurationReader } from "./configuration-reader.js";
export type { LogRecord, LogSink, Logger } from "./logger.js";
