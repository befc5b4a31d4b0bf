/**
 * Tests for agent configuration module
 *
 * Covers:
 * - CLI argument parsing
 * - Environment variable support
 * - Default value application
 * - Required settings and unparsable values
 */

import { hostname } from "node:os";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ENV_VARS } from "../config/index.js";
import { createMockLogger, loadConfigFresh } from "./test-utils.js";

const REQUIRED_ARGS = [
	"--server-url=http://cli:8080",
	"--api-key=test-secret",
	"--runner=python3 runner.py",
];

describe("Agent Config", () => {
	const originalEnv = process.env;

	beforeEach(() => {
		vi.resetModules();
		process.env = { ...originalEnv };
		for (const name of Object.values(ENV_VARS)) {
			delete process.env[name];
		}
	});

	afterEach(() => {
		process.env = originalEnv;
	});

	describe("loadConfig", () => {
		describe("with CLI arguments", () => {
			it("parses the required flags", async () => {
				const config = await loadConfigFresh(REQUIRED_ARGS);
				expect(config.serverUrl).toBe("http://cli:8080");
				expect(config.apiKey).toBe("test-secret");
				expect(config.runner).toEqual(["python3", "runner.py"]);
			});

			it("parses --agent-name flag", async () => {
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--agent-name=worker-1"]);
				expect(config.agentName).toBe("worker-1");
			});

			it("parses --poll-interval flag as seconds", async () => {
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--poll-interval=3"]);
				expect(config.pollIntervalMs).toBe(3000);
			});

			it("parses --default-timeout flag", async () => {
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--default-timeout=30"]);
				expect(config.defaultTimeoutSeconds).toBe(30);
			});

			it("ignores unknown flags", async () => {
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--verbose", "--state-dir=/tmp"]);
				expect(config.serverUrl).toBe("http://cli:8080");
			});
		});

		describe("with environment variables", () => {
			beforeEach(() => {
				process.env.SERVER_URL = "http://env-server:9000";
				process.env.AGENT_API_KEY = "env-secret";
				process.env.AGENT_RUNNER = "/usr/bin/runner";
			});

			it("reads the required settings from the environment", async () => {
				const config = await loadConfigFresh([]);
				expect(config.serverUrl).toBe("http://env-server:9000");
				expect(config.apiKey).toBe("env-secret");
				expect(config.runner).toEqual(["/usr/bin/runner"]);
			});

			it("reads AGENT_NAME from environment", async () => {
				process.env.AGENT_NAME = "env-agent";
				const config = await loadConfigFresh([]);
				expect(config.agentName).toBe("env-agent");
			});

			it("reads POLL_INTERVAL_SECONDS from environment", async () => {
				process.env.POLL_INTERVAL_SECONDS = "7";
				const config = await loadConfigFresh([]);
				expect(config.pollIntervalMs).toBe(7000);
			});

			it("reads DEFAULT_JOB_TIMEOUT_SECONDS from environment", async () => {
				process.env.DEFAULT_JOB_TIMEOUT_SECONDS = "20";
				const config = await loadConfigFresh([]);
				expect(config.defaultTimeoutSeconds).toBe(20);
			});

			it("treats a blank variable as unset", async () => {
				process.env.AGENT_NAME = "   ";
				const config = await loadConfigFresh([]);
				expect(config.agentName).toBe(hostname());
			});
		});

		describe("priority", () => {
			it("prefers CLI arguments over environment variables", async () => {
				process.env.SERVER_URL = "http://env-server:9000";
				process.env.AGENT_API_KEY = "env-secret";
				process.env.AGENT_RUNNER = "/usr/bin/runner";
				process.env.AGENT_NAME = "env-agent";
				process.env.POLL_INTERVAL_SECONDS = "7";

				const config = await loadConfigFresh([...REQUIRED_ARGS, "--agent-name=cli-agent", "--poll-interval=2"]);

				expect(config.serverUrl).toBe("http://cli:8080");
				expect(config.apiKey).toBe("test-secret");
				expect(config.runner).toEqual(["python3", "runner.py"]);
				expect(config.agentName).toBe("cli-agent");
				expect(config.pollIntervalMs).toBe(2000);
			});

			it("fills a setting missing from the CLI from the environment", async () => {
				process.env.AGENT_RUNNER = "/usr/bin/runner";
				const config = await loadConfigFresh(["--server-url=http://cli:8080", "--api-key=test-secret"]);
				expect(config.runner).toEqual(["/usr/bin/runner"]);
			});
		});

		describe("defaults", () => {
			it("applies defaults for the optional settings", async () => {
				const config = await loadConfigFresh(REQUIRED_ARGS);
				expect(config.agentName).toBe(hostname());
				expect(config.pollIntervalMs).toBe(10000);
				expect(config.defaultTimeoutSeconds).toBe(15);
				expect(config.requestTimeoutMs).toBe(10000);
			});

			it("returns a frozen config", async () => {
				const config = await loadConfigFresh(REQUIRED_ARGS);
				expect(Object.isFrozen(config)).toBe(true);
				expect(Object.isFrozen(config.runner)).toBe(true);
			});
		});

		describe("normalization", () => {
			it("strips trailing slashes from the server URL", async () => {
				const config = await loadConfigFresh([
					"--server-url=http://cli:8080/api//",
					"--api-key=test-secret",
					"--runner=runner",
				]);
				expect(config.serverUrl).toBe("http://cli:8080/api");
			});

			it("splits the runner on any whitespace", async () => {
				process.env.SERVER_URL = "http://env-server:9000";
				process.env.AGENT_API_KEY = "test-secret";
				process.env.AGENT_RUNNER = "  node   runner.mjs\t--verbose ";
				const config = await loadConfigFresh([]);
				expect(config.runner).toEqual(["node", "runner.mjs", "--verbose"]);
			});

			it("accepts a poll interval of 0", async () => {
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--poll-interval=0"]);
				expect(config.pollIntervalMs).toBe(0);
			});
		});

		describe("required settings", () => {
			it("fails when the server URL is missing", async () => {
				await expect(loadConfigFresh(["--api-key=test-secret", "--runner=runner"]))
					.rejects.toThrow("Missing SERVER_URL environment (or --server-url)");
			});

			it("fails when the API key is missing", async () => {
				await expect(loadConfigFresh(["--server-url=http://cli:8080", "--runner=runner"]))
					.rejects.toThrow("Missing AGENT_API_KEY environment (or --api-key)");
			});

			it("fails when the runner is missing", async () => {
				await expect(loadConfigFresh(["--server-url=http://cli:8080", "--api-key=test-secret"]))
					.rejects.toThrow("Missing AGENT_RUNNER environment (or --runner)");
			});

			it("fails when the runner is only whitespace", async () => {
				const error = await loadConfigFresh(["--server-url=http://cli:8080", "--api-key=test-secret", "--runner=  "])
					.catch((err: unknown) => err);
				expect(error).toBeInstanceOf(Error);
				expect(error).toHaveProperty("name", "ConfigurationError");
			});

			it("throws a ConfigurationError", async () => {
				const { loadConfig } = await import("../config/index.js");
				const { ConfigurationError } = await import("../errors/index.js");
				expect(() => loadConfig([], createMockLogger())).toThrow(ConfigurationError);
			});
		});

		describe("unparsable values", () => {
			it("warns and falls back to the default poll interval", async () => {
				const logger = createMockLogger();
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--poll-interval=soon"], logger);

				expect(config.pollIntervalMs).toBe(10000);
				expect(logger.warn).toHaveBeenCalledWith(
					"Could not parse POLL_INTERVAL_SECONDS \"soon\", defaulting to 10 seconds",
				);
			});

			it("warns and falls back to the default timeout for a negative value", async () => {
				const logger = createMockLogger();
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--default-timeout=-5"], logger);

				expect(config.defaultTimeoutSeconds).toBe(15);
				expect(logger.warn).toHaveBeenCalledWith(
					"Could not parse DEFAULT_JOB_TIMEOUT_SECONDS \"-5\", defaulting to 15 seconds",
				);
			});

			it("rejects a default timeout of 0", async () => {
				const logger = createMockLogger();
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--default-timeout=0"], logger);

				expect(config.defaultTimeoutSeconds).toBe(15);
				expect(logger.warn).toHaveBeenCalledTimes(1);
			});

			it("warns and falls back to the default poll interval when it is longer than a timer can wait", async () => {
				process.env.SERVER_URL = "http://env-server:9000";
				process.env.AGENT_API_KEY = "test-secret";
				process.env.AGENT_RUNNER = "/usr/bin/runner";
				process.env.POLL_INTERVAL_SECONDS = "3000000";
				const logger = createMockLogger();
				const config = await loadConfigFresh([], logger);

				expect(config.pollIntervalMs).toBe(10000);
				expect(logger.warn).toHaveBeenCalledWith(
					"Could not parse POLL_INTERVAL_SECONDS \"3000000\", defaulting to 10 seconds",
				);
			});

			it("warns and falls back to the default timeout when it is longer than a timer can wait", async () => {
				const logger = createMockLogger();
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--default-timeout=2147484"], logger);

				expect(config.defaultTimeoutSeconds).toBe(15);
				expect(logger.warn).toHaveBeenCalledWith(
					"Could not parse DEFAULT_JOB_TIMEOUT_SECONDS \"2147484\", defaulting to 15 seconds",
				);
			});

			it("accepts the longest timer delay", async () => {
				const logger = createMockLogger();
				const config = await loadConfigFresh([...REQUIRED_ARGS, "--poll-interval=2147483", "--default-timeout=2147483"], logger);

				expect(config.pollIntervalMs).toBe(2147483000);
				expect(config.defaultTimeoutSeconds).toBe(2147483);
				expect(logger.warn).not.toHaveBeenCalled();
			});

			it("does not warn for valid values", async () => {
				const logger = createMockLogger();
				await loadConfigFresh([...REQUIRED_ARGS, "--poll-interval=5", "--default-timeout=5"], logger);

				expect(logger.warn).not.toHaveBeenCalled();
			});
		});
	});
});
