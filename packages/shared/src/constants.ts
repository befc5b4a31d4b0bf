/**
 * Shared constants for the agent and the control-plane contract.
 *
 * Constants are organized into domain-specific groups for easier discovery.
 */

// =============================================================================
// Execution Defaults
// =============================================================================

/** Bound applied to a job whose timeout is 0 (seconds) */
export const DEFAULT_JOB_TIMEOUT_SECONDS = 15;

/** Sleep between polls when the control plane has no job (seconds) */
export const DEFAULT_POLL_INTERVAL_SECONDS = 10;

/**
 * Process exit code reported when the child ended without one
 * (killed by a signal).
 */
export const SIGNALLED_EXIT_CODE = -1;

/**
 * Longest delay a timer can wait for (2^31-1 ms), in whole seconds.
 * Job bounds, the default bound and the poll interval may not exceed it.
 */
export const MAX_TIMER_SECONDS = Math.floor(0x7fffffff / 1000);

// =============================================================================
// Capability Discovery
// =============================================================================

/**
 * Reserved command asking the runnable command for the commands it supports.
 * Its primary output must be a JSON array of command names.
 */
export const LIST_COMMAND = "list";

/** Input passed along with the reserved list command */
export const LIST_COMMAND_INPUT = "{}";

// =============================================================================
// Control Plane Protocol
// =============================================================================

/** Client-side timeout for poll and notify requests in milliseconds */
export const CONTROL_PLANE_REQUEST_TIMEOUT_MS = 10_000;

/**
 * Grouped control-plane endpoint paths, relative to the server URL.
 */
export const CONTROL_PLANE_ENDPOINTS = {
	/** Hands out the next job, 404 when there is none */
	POLL: "/pop",
	/** Receives the outcome of a job */
	NOTIFY: "/notify",
} as const;

/**
 * Grouped request header names.
 */
export const CONTROL_PLANE_HEADERS = {
	AUTHORIZATION: "Authorization",
	RUNNER_NAME: "X-Runner-Name",
	CONTENT_TYPE: "Content-Type",
} as const;

/** Scheme prefix of the Authorization header value */
export const API_KEY_SCHEME = "ApiKey";
