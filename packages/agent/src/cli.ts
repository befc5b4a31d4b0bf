/**
 * CLI entry point for the agent.
 *
 * Any fatal error (missing configuration, failed capability discovery,
 * control-plane errors, unkillable process) exits with status 1 so that the
 * process manager running the agent can restart it. SIGINT and SIGTERM stop
 * the agent before its next poll: an idle agent exits at once, a busy one
 * after reporting the current job.
 */

import { loadConfig } from "./config/index.js";
import { createAgent } from "./di/index.js";
import { LoggerImpl } from "./logger/index.js";
import { formatError } from "./utils/index.js";

const logger = new LoggerImpl("cli");

async function main(): Promise<void> {
	logger.info("Started");
	const config = loadConfig(process.argv.slice(2));
	const agent = createAgent(config);

	// Let the job in flight finish and be reported, then exit cleanly
	const shutdown = (signal: NodeJS.Signals) => {
		logger.info(`Received ${signal}, stopping after the current job`);
		agent.stop();
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	await agent.start();
}

main().catch((err: unknown) => {
	logger.error(`Agent failed: ${formatError(err)}`);
	process.exit(1);
});
