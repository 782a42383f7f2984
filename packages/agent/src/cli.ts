/**
 * CLI entry point: prints the configuration resolved from the environment.
 */

import { CONFIGURATION, CONFIGURATION_READER, createAgentContainer } from "./di/index.js";
import { formatError } from "./utils/format-error.js";

/**
 * Check if this module is being run directly (as CLI entry point).
 * Works for both .js (compiled) and .ts (tsx) execution.
 */
function isMainModule(): boolean {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		return false;
	}
	return scriptPath.includes("packages/agent") && (scriptPath.endsWith("cli.js") || scriptPath.endsWith("cli.ts"));
}

export function printConfiguration(write: (text: string) => void = (text) => process.stdout.write(text)): void {
	const container = createAgentContainer();
	const reader = container.resolve(CONFIGURATION_READER);
	const configuration = container.resolve(CONFIGURATION);
	write(`${JSON.stringify({ origin: reader.origin, ...configuration }, null, 2)}\n`);
}

if (isMainModule()) {
	try {
		printConfiguration();
	} catch (err) {
		console.error(`Failed to resolve configuration: ${formatError(err)}`);
		process.exitCode = 1;
	}
}
