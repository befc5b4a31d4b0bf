/**
 * Process Manager for E2E Tests
 *
 * Spawns the agent CLI as a child process with tsx as its loader.
 * Configuration is passed through the environment and everything the agent
 * logs is collected.
 */

import { type ChildProcess, spawn } from "node:child_process";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { AGENT_STARTUP_TIMEOUT_MS, TEST_AGENT_NAME, TEST_API_KEY } from "./constants.js";
import { waitFor } from "./wait.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
// Go up: helpers -> src -> e2e
const E2E_DIR = path.resolve(__dirname, "../..");
const REPO_ROOT = path.resolve(E2E_DIR, "../..");
const AGENT_CLI = path.join(REPO_ROOT, "packages", "agent", "src", "cli.ts");

/** Absolute path of the runnable command fixture */
export const RUNNER_FIXTURE = path.join(E2E_DIR, "src", "fixtures", "runner.mjs");

/** Environment variables the agent reads its configuration from */
const AGENT_ENV_VARS = [
	"SERVER_URL",
	"AGENT_API_KEY",
	"AGENT_RUNNER",
	"AGENT_NAME",
	"POLL_INTERVAL_SECONDS",
	"DEFAULT_JOB_TIMEOUT_SECONDS",
] as const;

/**
 * Runner command line executing the fixture with the current node binary.
 */
export function fixtureRunner(...flags: string[]): string {
	return [process.execPath, RUNNER_FIXTURE, ...flags].join(" ");
}

export interface AgentOptions {
	/** Omitted settings are left unset, so their defaults (or errors) apply */
	serverUrl?: string;
	apiKey?: string;
	runner?: string;
	agentName?: string;
	pollIntervalSeconds?: number;
	defaultTimeoutSeconds?: number;
}

export interface AgentProcess {
	process: ChildProcess;
	/** Everything the agent logged so far, both streams */
	output(): string;
	waitForOutput(pattern: RegExp, timeoutMs?: number): Promise<void>;
	/** Resolves with the exit code, null when killed by a signal */
	waitForExit(timeoutMs?: number): Promise<number | null>;
	stop(): Promise<void>;
	kill(): void;
}

function buildEnv(options: AgentOptions): NodeJS.ProcessEnv {
	const env: NodeJS.ProcessEnv = { ...process.env };
	for (const name of AGENT_ENV_VARS) {
		delete env[name];
	}

	const settings: Record<(typeof AGENT_ENV_VARS)[number], string | number | undefined> = {
		SERVER_URL: options.serverUrl,
		AGENT_API_KEY: options.apiKey,
		AGENT_RUNNER: options.runner,
		AGENT_NAME: options.agentName,
		POLL_INTERVAL_SECONDS: options.pollIntervalSeconds,
		DEFAULT_JOB_TIMEOUT_SECONDS: options.defaultTimeoutSeconds,
	};
	for (const [name, value] of Object.entries(settings)) {
		if (value !== undefined) {
			env[name] = String(value);
		}
	}

	env.LOG_LEVEL = "debug";
	return env;
}

function hasExited(proc: ChildProcess): boolean {
	return proc.exitCode !== null || proc.signalCode !== null;
}

/**
 * Spawn the agent CLI without waiting for it to start.
 */
export function spawnAgent(options: AgentOptions): AgentProcess {
	const proc = spawn(process.execPath, ["--import", "tsx", AGENT_CLI], {
		cwd: REPO_ROOT,
		env: buildEnv(options),
		stdio: ["ignore", "pipe", "pipe"],
	});

	let output = "";
	const onData = (data: Buffer) => {
		output += data.toString();
	};
	proc.stdout?.on("data", onData);
	proc.stderr?.on("data", onData);

	const exited = new Promise<number | null>((resolve) => {
		proc.once("exit", (code) => resolve(code));
	});

	const waitForOutput = async (pattern: RegExp, timeoutMs = 10000): Promise<void> => {
		try {
			await waitFor(() => pattern.test(output), { timeoutMs }, `pattern ${pattern}`);
		} catch (err) {
			throw new Error(`${err instanceof Error ? err.message : String(err)}. Output: ${output}`);
		}
	};

	const waitForExit = async (timeoutMs = 10000): Promise<number | null> => {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<never>((_resolve, reject) => {
			timer = setTimeout(() => {
				reject(new Error(`Agent did not exit within ${timeoutMs}ms. Output: ${output}`));
			}, timeoutMs);
		});
		try {
			return await Promise.race([exited, timeout]);
		} finally {
			clearTimeout(timer);
		}
	};

	const stop = async (): Promise<void> => {
		if (hasExited(proc)) {
			return;
		}
		proc.kill("SIGTERM");
		await Promise.race([
			exited,
			new Promise<void>((resolve) => setTimeout(resolve, 2000)),
		]);
		// A job in flight can hold the agent past the grace period
		if (!hasExited(proc)) {
			proc.kill("SIGKILL");
			await exited;
		}
	};

	const kill = (): void => {
		if (!hasExited(proc)) {
			proc.kill("SIGKILL");
		}
	};

	return {
		process: proc,
		output: () => output,
		waitForOutput,
		waitForExit,
		stop,
		kill,
	};
}

/**
 * Start the agent CLI with the test API key, agent name and runner fixture,
 * and wait until it has started.
 */
export async function startAgent(options: AgentOptions): Promise<AgentProcess> {
	const agent = spawnAgent({
		apiKey: TEST_API_KEY,
		agentName: TEST_AGENT_NAME,
		runner: fixtureRunner(),
		...options,
	});
	await agent.waitForOutput(/Agent .* starting/, AGENT_STARTUP_TIMEOUT_MS);
	return agent;
}
