import type { JobSpec, RunOutcome } from "@remote-job-agent/shared";

/**
 * Runs a command under a hard time bound and maps its exit to a RunOutcome.
 * Rejects only on agent faults (spawn or kill failures).
 */
export interface ExecutionSupervisor {
	run(command: string, args: readonly string[], timeoutSeconds: number): Promise<RunOutcome>;
	/** Run a job through the configured runnable command. */
	runJob(job: Pick<JobSpec, "command" | "input" | "timeoutSeconds">): Promise<RunOutcome>;
}
