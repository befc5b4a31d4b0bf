/**
 * Wire contract between the agent and the control plane.
 */

export * from "./constants.js";
export { FAILED_OUTPUT, toNotificationPayload } from "./types/job.js";
export type { JobSpec, NotificationPayload, RunOutcome } from "./types/job.js";
export { isPollResponse, parseCapabilityList, parseJobSpec, toNotifyRequest } from "./types/api.js";
export type { NotifyRequest, PollRequest, PollResponse } from "./types/api.js";
