/**
 * Default values for the optional settings of the agent.
 */

import {
	CONTROL_PLANE_REQUEST_TIMEOUT_MS,
	DEFAULT_JOB_TIMEOUT_SECONDS,
	DEFAULT_POLL_INTERVAL_SECONDS,
} from "@remote-job-agent/shared";
import { resolveAgentName } from "./agent-name.js";

export interface ConfigDefaults {
	agentName: string;
	pollIntervalSeconds: number;
	defaultTimeoutSeconds: number;
	requestTimeoutMs: number;
}

export function getDefaultConfig(): ConfigDefaults {
	return {
		agentName: resolveAgentName(),
		pollIntervalSeconds: DEFAULT_POLL_INTERVAL_SECONDS,
		defaultTimeoutSeconds: DEFAULT_JOB_TIMEOUT_SECONDS,
		requestTimeoutMs: CONTROL_PLANE_REQUEST_TIMEOUT_MS,
	};
}
