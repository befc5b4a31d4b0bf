// =============================================================================
// Jobs
// =============================================================================

/**
 * One unit of work handed out by the control plane.
 * Consumed exactly once by the execution supervisor.
 */
export interface JobSpec {
	/** Opaque identifier, echoed back as the notification's runId */
	readonly id: string;
	/** Operation name understood by the runnable command */
	readonly command: string;
	/** Opaque payload passed to the runnable command as its last argument */
	readonly input: string;
	/** Execution bound in seconds, 0 meaning the default bound */
	readonly timeoutSeconds: number;
}

// =============================================================================
// Outcomes
// =============================================================================

/**
 * Output value reported for a failed run in place of the primary stream.
 */
export const FAILED_OUTPUT = null;

/**
 * Result of running one job.
 * - succeeded: the process exited with code 0 within its bound
 * - output: full primary stream on success, FAILED_OUTPUT otherwise
 * - diagnostics: full secondary stream, whatever the exit code
 */
export type RunOutcome =
	| {
		readonly succeeded: true;
		readonly output: string;
		readonly diagnostics: string;
	}
	| {
		readonly succeeded: false;
		readonly output: typeof FAILED_OUTPUT;
		readonly diagnostics: string;
	};

/**
 * Report of a run, keyed by the id of the job it came from.
 */
export interface NotificationPayload {
	runId: string;
	success: boolean;
	output: string | null;
	logs: string;
}

/**
 * Derive the notification for a job from its outcome.
 */
export function toNotificationPayload(job: JobSpec, outcome: RunOutcome): NotificationPayload {
	return {
		runId: job.id,
		success: outcome.succeeded,
		output: outcome.output,
		logs: outcome.diagnostics,
	};
}
