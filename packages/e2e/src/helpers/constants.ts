/**
 * E2E Test Constants
 *
 * Timing values shared by the E2E suites.
 */

/** API key the agents under test are started with */
export const TEST_API_KEY = "test-secret";

/** Agent name the agents under test report in X-Runner-Name */
export const TEST_AGENT_NAME = "e2e-agent";

/**
 * Poll interval of the agents under test, in seconds.
 * The CLI only takes whole seconds.
 */
export const E2E_POLL_INTERVAL_SECONDS = 1;

/** How long to wait for the agent CLI to start under tsx */
export const AGENT_STARTUP_TIMEOUT_MS = 15000;

/** Default timeout for waitFor */
export const DEFAULT_WAIT_TIMEOUT_MS = 10000;

/** Timeout for tests that wait out a job timeout */
export const LONG_TEST_TIMEOUT_MS = 60000;
