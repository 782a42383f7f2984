/**
 * Eight-byte identifier of the publisher of a code module.
 */
export type PublisherToken = Uint8Array;

/**
 * One entry of the active call chain.
 */
export interface CallFrame {
	/** Name of the code module that declares the frame's function */
	readonly moduleName: string;
	readonly publisherToken: PublisherToken;
}

/**
 * Supplies the current call chain, innermost frame first.
 */
export interface CallChainInspector {
	frames(): readonly CallFrame[];
}
