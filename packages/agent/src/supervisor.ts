import { type SpawnOptions, spawn } from "node:child_process";
import type { Readable } from "node:stream";
import type { JobSpec, RunOutcome } from "@remote-job-agent/shared";
import { FAILED_OUTPUT, MAX_TIMER_SECONDS, SIGNALLED_EXIT_CODE } from "@remote-job-agent/shared";
import type { AgentConfig, ExecutionSupervisor, Logger } from "./types/index.js";
import { ConfigurationError, ProcessKillError, ProcessSpawnError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";

/**
 * The parts of a child process the supervisor relies on.
 */
export interface SupervisedProcess {
	readonly pid?: number;
	readonly stdout: Readable | null;
	readonly stderr: Readable | null;
	kill(signal?: NodeJS.Signals): boolean;
	once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
	once(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => SupervisedProcess;

/**
 * How the completion watcher ended: a closed process with its exit code,
 * or a failure to start or wait on it.
 */
type Completion =
	| { kind: "closed"; exitCode: number }
	| { kind: "failed"; error: Error };

/**
 * Resolve the bound of a job, in seconds.
 * Zero (and anything that is not a positive number) means the default bound.
 * Bounds longer than a timer can wait are capped at MAX_TIMER_SECONDS.
 */
export function resolveTimeoutSeconds(timeoutSeconds: number, defaultTimeoutSeconds: number): number {
	const bound = Number.isFinite(timeoutSeconds) && timeoutSeconds > 0 ? timeoutSeconds : defaultTimeoutSeconds;
	return Math.min(bound, MAX_TIMER_SECONDS);
}

/**
 * Runs the runnable command as a child process under a deadline.
 *
 * The exit of the process is raced against a timer. When the timer wins the
 * process is killed and its exit is still awaited, so no child outlives the
 * call that started it.
 */
export class ExecutionSupervisorImpl implements ExecutionSupervisor {
	private readonly program: string;
	private readonly leadingArgs: readonly string[];
	private readonly defaultTimeoutSeconds: number;
	private readonly logger: Logger;

	constructor(
		config: AgentConfig,
		logger?: Logger,
		private readonly spawnFn: SpawnFn = spawn,
	) {
		const [program, ...leadingArgs] = config.runner;
		if (program === undefined) {
			throw new ConfigurationError("Runner command is empty");
		}
		this.program = program;
		this.leadingArgs = leadingArgs;
		this.defaultTimeoutSeconds = config.defaultTimeoutSeconds;
		this.logger = logger ?? new LoggerImpl("supervisor");
	}

	runJob(job: Pick<JobSpec, "command" | "input" | "timeoutSeconds">): Promise<RunOutcome> {
		return this.run(this.program, [...this.leadingArgs, job.command, job.input], job.timeoutSeconds);
	}

	async run(command: string, args: readonly string[], timeoutSeconds: number): Promise<RunOutcome> {
		const boundSeconds = resolveTimeoutSeconds(timeoutSeconds, this.defaultTimeoutSeconds);

		let child: SupervisedProcess;
		try {
			child = this.spawnFn(command, args, {
				stdio: ["ignore", "pipe", "pipe"],
				shell: false,
				windowsHide: true,
			});
		} catch (err) {
			throw new ProcessSpawnError(command, err);
		}

		this.logger.debug(`Started ${command} (pid=${child.pid ?? "unknown"}, timeout=${boundSeconds}s)`);

		// Separate buffers: the primary stream is the result, the secondary one the logs
		const stdoutChunks: Buffer[] = [];
		const stderrChunks: Buffer[] = [];
		child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
		child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

		const completion = this.watchCompletion(child);

		let timerId: ReturnType<typeof setTimeout> | undefined;
		const deadline = new Promise<"deadline">(resolve => {
			timerId = setTimeout(() => resolve("deadline"), boundSeconds * 1000);
		});

		let finished: Completion;
		try {
			const first = await Promise.race([completion, deadline]);
			if (first === "deadline") {
				this.logger.warn(`Execution timeout after ${boundSeconds}s, killing process ${child.pid ?? "unknown"}`);
				if (!child.kill("SIGKILL")) {
					throw new ProcessKillError(command, child.pid);
				}
				// Killed processes still close; wait for it before reporting
				finished = await completion;
			} else {
				finished = first;
			}
		} finally {
			clearTimeout(timerId);
		}

		if (finished.kind === "failed") {
			throw new ProcessSpawnError(command, finished.error);
		}

		const diagnostics = Buffer.concat(stderrChunks).toString("utf8");

		if (finished.exitCode !== 0) {
			this.logger.info(`${command} exited with code ${finished.exitCode}`);
			return { succeeded: false, output: FAILED_OUTPUT, diagnostics };
		}

		return {
			succeeded: true,
			output: Buffer.concat(stdoutChunks).toString("utf8"),
			diagnostics,
		};
	}

	/**
	 * Settle once the process has closed or failed.
	 * "close" fires after both output streams have ended.
	 */
	private watchCompletion(child: SupervisedProcess): Promise<Completion> {
		return new Promise<Completion>(resolve => {
			let settled = false;

			child.once("error", (error) => {
				if (settled) {
					return;
				}
				settled = true;
				resolve({ kind: "failed", error });
			});

			child.once("close", (code) => {
				if (settled) {
					return;
				}
				settled = true;
				resolve({ kind: "closed", exitCode: code ?? SIGNALLED_EXIT_CODE });
			});
		});
	}
}
