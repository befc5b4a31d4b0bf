import { LIST_COMMAND, LIST_COMMAND_INPUT, parseCapabilityList, toNotificationPayload } from "@remote-job-agent/shared";
import type {
	Agent,
	AgentConfig,
	AgentState,
	ExecutionSupervisor,
	IterationResult,
	Logger,
	ServerClient,
} from "./types/index.js";
import { AGENT_STATE } from "./types/index.js";
import { CapabilityDiscoveryError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { type SleepFn, formatError, sleep } from "./utils/index.js";
import { ServerClientImpl } from "./server-client.js";
import { ExecutionSupervisorImpl } from "./supervisor.js";

/**
 * Agent implementation that polls for work and executes jobs one at a time.
 *
 * Lifecycle: BOOTSTRAPPING, then POLLING, EXECUTING and NOTIFYING for each
 * job, with IDLE between empty polls. Any error from discovery, polling or
 * notifying moves the agent to FATAL and is rethrown; nothing is retried.
 */
export class AgentImpl implements Agent {
	private readonly logger: Logger;
	private readonly serverClient: ServerClient;
	private readonly supervisor: ExecutionSupervisor;
	private readonly sleepFn: SleepFn;
	private state: AgentState = AGENT_STATE.BOOTSTRAPPING;
	private capabilities: readonly string[] | null = null;
	private running = false;
	private idleWait: AbortController | null = null;

	/**
	 * Create a new agent with injected dependencies.
	 * Dependencies that are not provided are created from the config.
	 */
	constructor(
		private readonly config: AgentConfig,
		logger?: Logger,
		serverClient?: ServerClient,
		supervisor?: ExecutionSupervisor,
		sleepFn?: SleepFn,
	) {
		this.logger = logger ?? new LoggerImpl("agent");
		this.serverClient = serverClient ?? new ServerClientImpl(config);
		this.supervisor = supervisor ?? new ExecutionSupervisorImpl(config);
		this.sleepFn = sleepFn ?? sleep;
	}

	getState(): AgentState {
		return this.state;
	}

	/**
	 * Ask the runnable command for the commands it supports.
	 * The list is kept and advertised on every poll.
	 */
	async bootstrap(): Promise<readonly string[]> {
		this.state = AGENT_STATE.BOOTSTRAPPING;

		return this.failFast(async () => {
			const outcome = await this.supervisor.runJob({
				command: LIST_COMMAND,
				input: LIST_COMMAND_INPUT,
				timeoutSeconds: 0,
			});

			if (!outcome.succeeded) {
				throw new CapabilityDiscoveryError(`list command failed: ${outcome.diagnostics.trim() || "no diagnostics"}`);
			}

			const capabilities = parseCapabilityList(outcome.output);
			if (capabilities === null) {
				throw new CapabilityDiscoveryError(`list output is not a JSON array of strings: ${outcome.output.trim()}`);
			}

			this.capabilities = Object.freeze(capabilities);
			this.logger.info(`Available commands: ${capabilities.join(", ") || "(none)"}`);
			return this.capabilities;
		});
	}

	/**
	 * Run one poll-execute-notify cycle.
	 * Requires a prior successful bootstrap().
	 */
	async runOneIteration(): Promise<IterationResult> {
		const capabilities = this.capabilities;
		if (capabilities === null) {
			throw new Error("Capabilities not discovered yet, call bootstrap() first");
		}

		return this.failFast(async () => {
			this.state = AGENT_STATE.POLLING;
			const job = await this.serverClient.poll(capabilities);

			if (!job) {
				return "idle";
			}

			this.state = AGENT_STATE.EXECUTING;
			this.logger.info(`Running job ${job.id} (command=${job.command})`);
			const outcome = await this.supervisor.runJob(job);

			this.state = AGENT_STATE.NOTIFYING;
			await this.serverClient.notify(toNotificationPayload(job, outcome));

			return "executed";
		});
	}

	/**
	 * Start the agent's main loop.
	 * Resolves once stop() is called, rejects on the first fatal error.
	 */
	async start(): Promise<void> {
		this.running = true;
		this.logger.info(`Agent ${this.config.agentName} starting`);

		try {
			await this.bootstrap();

			while (this.running) {
				const result = await this.runOneIteration();

				// A finished job is followed by an immediate poll
				if (result === "idle" && this.running) {
					this.state = AGENT_STATE.IDLE;
					this.logger.info(`No job found, waiting ${this.config.pollIntervalMs}ms`);
					await this.waitIdle();
				}
			}
		} catch (err) {
			this.running = false;
			this.logger.error(`Agent ${this.config.agentName} stopping: ${formatError(err)}`);
			throw err;
		}

		this.state = AGENT_STATE.STOPPED;
		this.logger.info("Agent stopped");
	}

	/**
	 * Stop the agent before its next poll.
	 * A job in flight still runs to completion and is reported; an idle wait
	 * between polls ends at once.
	 */
	stop(): void {
		this.running = false;
		this.idleWait?.abort();
	}

	private async waitIdle(): Promise<void> {
		const idleWait = new AbortController();
		this.idleWait = idleWait;
		try {
			await this.sleepFn(this.config.pollIntervalMs, idleWait.signal);
		} finally {
			this.idleWait = null;
		}
	}

	private async failFast<T>(operation: () => Promise<T>): Promise<T> {
		try {
			return await operation();
		} catch (err) {
			this.state = AGENT_STATE.FATAL;
			throw err;
		}
	}
}
