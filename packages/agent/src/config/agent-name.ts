/**
 * Agent identity helpers.
 */

import { hostname } from "node:os";

/**
 * Default agent name: the host it runs on.
 */
export function resolveAgentName(): string {
	return hostname();
}
