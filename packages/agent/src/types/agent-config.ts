/**
 * Agent configuration resolved once at startup and shared by every component.
 * Values are populated from CLI arguments, environment variables, or defaults.
 */
export interface AgentConfig {
	/** Control-plane base URL, without trailing slash */
	readonly serverUrl: string;
	/** Credential sent as `Authorization: ApiKey <apiKey>` */
	readonly apiKey: string;
	/** Runnable command line: program followed by its leading arguments */
	readonly runner: readonly string[];
	/** Stable agent identity sent as X-Runner-Name */
	readonly agentName: string;
	/** Sleep between polls when no job is available */
	readonly pollIntervalMs: number;
	/** Bound applied to jobs whose timeout is 0 */
	readonly defaultTimeoutSeconds: number;
	/** Client-side timeout for poll and notify requests */
	readonly requestTimeoutMs: number;
}
