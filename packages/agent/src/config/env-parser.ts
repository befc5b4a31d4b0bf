/**
 * Environment variable parsing for agent configuration.
 */

import { MAX_TIMER_SECONDS } from "@remote-job-agent/shared";

export interface ParsedEnv {
	serverUrl?: string;
	apiKey?: string;
	runner?: string;
	agentName?: string;
	pollInterval?: string;
	defaultTimeout?: string;
}

/**
 * Names of the environment variables read by the agent.
 */
export const ENV_VARS = {
	serverUrl: "SERVER_URL",
	apiKey: "AGENT_API_KEY",
	runner: "AGENT_RUNNER",
	agentName: "AGENT_NAME",
	pollInterval: "POLL_INTERVAL_SECONDS",
	defaultTimeout: "DEFAULT_JOB_TIMEOUT_SECONDS",
} as const satisfies Record<keyof ParsedEnv, string>;

function readEnv(key: string): string | undefined {
	const value = process.env[key];
	return value === undefined || value.trim() === "" ? undefined : value;
}

export function parseEnvVars(): ParsedEnv {
	return {
		serverUrl: readEnv(ENV_VARS.serverUrl),
		apiKey: readEnv(ENV_VARS.apiKey),
		runner: readEnv(ENV_VARS.runner),
		agentName: readEnv(ENV_VARS.agentName),
		pollInterval: readEnv(ENV_VARS.pollInterval),
		defaultTimeout: readEnv(ENV_VARS.defaultTimeout),
	};
}

/**
 * Parse a whole number of seconds.
 * Returns undefined for anything else, including negative values and
 * durations longer than a timer can wait.
 */
export function parseSeconds(value: string): number | undefined {
	if (!/^\s*\d+\s*$/.test(value)) {
		return undefined;
	}
	const seconds = parseInt(value, 10);
	return seconds <= MAX_TIMER_SECONDS ? seconds : undefined;
}
