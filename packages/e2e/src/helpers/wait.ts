/**
 * Wait Utilities for E2E Tests
 */

export interface WaitOptions {
	timeoutMs?: number;
	intervalMs?: number;
}

/**
 * Wait for a condition to become true
 */
export async function waitFor(
	condition: () => boolean,
	options: WaitOptions = {},
	description = "condition",
): Promise<void> {
	const { timeoutMs = 10000, intervalMs = 50 } = options;
	const startTime = Date.now();

	while (Date.now() - startTime < timeoutMs) {
		if (condition()) {
			return;
		}
		await sleep(intervalMs);
	}

	throw new Error(`Timeout waiting for ${description} after ${timeoutMs}ms`);
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
