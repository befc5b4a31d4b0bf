/**
 * Format an unknown error value into a one-line message,
 * following the `cause` chain of Error objects.
 */
export function formatError(err: unknown): string {
	if (!(err instanceof Error)) {
		return String(err);
	}
	if (err.cause === undefined) {
		return err.message;
	}
	return `${err.message} (caused by: ${formatError(err.cause)})`;
}
