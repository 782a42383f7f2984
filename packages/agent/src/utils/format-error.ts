/**
 * Format an unknown thrown value as `Name: message`, or its string form
 * when it is not an Error.
 */
export function formatError(err: unknown): string {
	return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
