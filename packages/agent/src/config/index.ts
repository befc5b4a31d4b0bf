/**
 * Agent configuration module.
 *
 * Load agent configuration from CLI arguments, environment variables, and defaults.
 * Priority: CLI > Environment > Defaults
 */

import type { AgentConfig, Logger } from "../types/index.js";
import { ConfigurationError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { parseCliArgs } from "./cli-parser.js";
import { getDefaultConfig } from "./defaults.js";
import { ENV_VARS, parseEnvVars, parseSeconds } from "./env-parser.js";

function requireSetting(value: string | undefined, envVar: string, flag: string): string {
	if (value === undefined || value.trim() === "") {
		throw new ConfigurationError(`Missing ${envVar} environment (or ${flag})`);
	}
	return value.trim();
}

/**
 * Split a runner command line such as "python3 runner.py" into its words.
 */
export function splitRunner(runner: string): string[] {
	return runner.trim().split(/\s+/).filter(word => word.length > 0);
}

function resolveSeconds(
	raw: string | undefined,
	fallback: number,
	name: string,
	logger: Logger,
	options: { allowZero: boolean },
): number {
	if (raw === undefined) {
		return fallback;
	}
	const parsed = parseSeconds(raw);
	if (parsed === undefined || (parsed === 0 && !options.allowZero)) {
		logger.warn(`Could not parse ${name} "${raw}", defaulting to ${fallback} seconds`);
		return fallback;
	}
	return parsed;
}

/**
 * Load agent configuration from CLI arguments, environment variables, and defaults.
 * Priority: CLI > Environment > Defaults
 *
 * @throws ConfigurationError when the server URL, API key or runner is missing
 */
export function loadConfig(args: string[], logger: Logger = new LoggerImpl("config")): AgentConfig {
	const cli = parseCliArgs(args);
	const env = parseEnvVars();
	const defaults = getDefaultConfig();

	// Merge with priority: CLI > Environment > Defaults
	const serverUrl = requireSetting(cli.serverUrl ?? env.serverUrl, ENV_VARS.serverUrl, "--server-url");
	const apiKey = requireSetting(cli.apiKey ?? env.apiKey, ENV_VARS.apiKey, "--api-key");
	const runner = splitRunner(requireSetting(cli.runner ?? env.runner, ENV_VARS.runner, "--runner"));

	const pollIntervalSeconds = resolveSeconds(
		cli.pollInterval ?? env.pollInterval,
		defaults.pollIntervalSeconds,
		ENV_VARS.pollInterval,
		logger,
		{ allowZero: true },
	);
	const defaultTimeoutSeconds = resolveSeconds(
		cli.defaultTimeout ?? env.defaultTimeout,
		defaults.defaultTimeoutSeconds,
		ENV_VARS.defaultTimeout,
		logger,
		{ allowZero: false },
	);

	return Object.freeze({
		serverUrl: serverUrl.replace(/\/+$/, ""),
		apiKey,
		runner: Object.freeze(runner),
		agentName: cli.agentName ?? env.agentName ?? defaults.agentName,
		pollIntervalMs: pollIntervalSeconds * 1000,
		defaultTimeoutSeconds,
		requestTimeoutMs: defaults.requestTimeoutMs,
	});
}

export { ENV_VARS } from "./env-parser.js";
