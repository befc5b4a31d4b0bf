/**
 * E2E Test Fixture
 *
 * Encapsulates the control plane and agent lifecycle shared by the E2E suites.
 *
 * Usage:
 *   const fixture = createTestFixture();
 *
 *   beforeEach(async () => fixture.setupTest());
 *   afterEach(async () => fixture.teardownTest());
 */

import { type MockControlPlane, createMockControlPlane } from "./control-plane.js";
import { type AgentOptions, type AgentProcess, spawnAgent, startAgent } from "./process-manager.js";
import { E2E_POLL_INTERVAL_SECONDS } from "./constants.js";

export interface TestFixture {
	/** The current control plane (throws until setupTest is called) */
	readonly controlPlane: MockControlPlane;

	/**
	 * Setup a single test (call in beforeEach).
	 * Starts a fresh control plane.
	 */
	setupTest(): Promise<void>;

	/**
	 * Teardown a single test (call in afterEach).
	 * Stops all agents, then the control plane.
	 */
	teardownTest(): Promise<void>;

	/**
	 * Start an agent pointed at the control plane and track it for cleanup.
	 */
	startAgent(options?: AgentOptions): Promise<AgentProcess>;

	/**
	 * Spawn an agent without waiting for it to start, for agents expected to exit.
	 */
	spawnAgent(options: AgentOptions): AgentProcess;
}

export function createTestFixture(): TestFixture {
	let controlPlane: MockControlPlane | null = null;
	const agents: AgentProcess[] = [];

	const requireControlPlane = (): MockControlPlane => {
		if (!controlPlane) {
			throw new Error("Fixture not set up. Call setupTest() first.");
		}
		return controlPlane;
	};

	const track = (agent: AgentProcess): AgentProcess => {
		agents.push(agent);
		return agent;
	};

	return {
		get controlPlane() {
			return requireControlPlane();
		},
		setupTest: async () => {
			controlPlane = await createMockControlPlane();
		},
		teardownTest: async () => {
			await Promise.all(agents.map(agent => agent.stop()));
			agents.length = 0;

			if (controlPlane) {
				await controlPlane.close();
				controlPlane = null;
			}
		},
		startAgent: async (options = {}) => {
			return track(await startAgent({
				serverUrl: requireControlPlane().url,
				pollIntervalSeconds: E2E_POLL_INTERVAL_SECONDS,
				...options,
			}));
		},
		spawnAgent: (options) => track(spawnAgent(options)),
	};
}
