import { existsSync, readFileSync } from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { CallChainInspector, CallFrame, PublisherToken } from "../../types/index.js";
import { RUNTIME_PUBLISHER, publisherOf, publisherTokenFor } from "./publisher-token.js";

function captureCallSites(): NodeJS.CallSite[] {
	const previousPrepare = Error.prepareStackTrace;
	const previousLimit = Error.stackTraceLimit;
	let sites: NodeJS.CallSite[] = [];

	try {
		Error.stackTraceLimit = Infinity;
		Error.prepareStackTrace = (_error, callSites) => {
			sites = callSites;
			return "";
		};
		const holder: { stack?: string } = {};
		Error.captureStackTrace(holder);
		// Reading the property runs prepareStackTrace
		if (holder.stack === undefined) {
			return [];
		}
	} finally {
		Error.prepareStackTrace = previousPrepare;
		Error.stackTraceLimit = previousLimit;
	}

	return sites;
}

function toFilePath(fileName: string): string | undefined {
	if (fileName.startsWith("file://")) {
		return fileURLToPath(fileName);
	}
	return path.isAbsolute(fileName) ? fileName : undefined;
}

function readPackageName(manifestPath: string): string | undefined {
	try {
		const manifest: unknown = JSON.parse(readFileSync(manifestPath, "utf8"));
		if (typeof manifest === "object" && manifest !== null && "name" in manifest && typeof manifest.name === "string") {
			return manifest.name;
		}
		return undefined;
	} catch {
		// Malformed manifests do not name a package
		return undefined;
	}
}

/**
 * Publisher of a source file: the scope of its package, or the file path
 * itself when no package.json names it. Paths are absolute, so they never
 * collide with a scope or with the runtime publisher.
 */
export function publisherForFile(filePath: string, packageName: string | undefined): string {
	return packageName === undefined ? filePath : publisherOf(packageName);
}

/**
 * Call chain of the running process, read from V8 call sites.
 *
 * Each file is attributed to the package named by its nearest package.json;
 * files outside any package use their base name as module name and their path
 * as publisher. Runtime-internal, native and eval frames belong to the runtime
 * publisher.
 */
export class StackCallChainInspector implements CallChainInspector {
	private readonly modulesByDirectory = new Map<string, string | undefined>();
	private readonly tokensByPublisher = new Map<string, PublisherToken>();

	frames(): readonly CallFrame[] {
		return captureCallSites().map((site) => this.toFrame(site.getFileName()));
	}

	private toFrame(fileName: string | null | undefined): CallFrame {
		const filePath = fileName ? toFilePath(fileName) : undefined;
		if (filePath === undefined) {
			return { moduleName: RUNTIME_PUBLISHER, publisherToken: this.tokenFor(RUNTIME_PUBLISHER) };
		}

		const packageName = this.packageNameFor(path.dirname(filePath));
		const moduleName = packageName ?? path.basename(filePath, path.extname(filePath));
		return { moduleName, publisherToken: this.tokenFor(publisherForFile(filePath, packageName)) };
	}

	private packageNameFor(directory: string): string | undefined {
		if (this.modulesByDirectory.has(directory)) {
			return this.modulesByDirectory.get(directory);
		}

		const manifestPath = path.join(directory, "package.json");
		let name = existsSync(manifestPath) ? readPackageName(manifestPath) : undefined;
		if (name === undefined) {
			const parent = path.dirname(directory);
			name = parent === directory ? undefined : this.packageNameFor(parent);
		}

		this.modulesByDirectory.set(directory, name);
		return name;
	}

	private tokenFor(publisher: string): PublisherToken {
		let token = this.tokensByPublisher.get(publisher);
		if (token === undefined) {
			token = publisherTokenFor(publisher);
			this.tokensByPublisher.set(publisher, token);
		}
		return token;
	}
}
