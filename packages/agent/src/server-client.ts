import type { JobSpec, NotificationPayload, PollRequest } from "@remote-job-agent/shared";
import {
	API_KEY_SCHEME,
	CONTROL_PLANE_ENDPOINTS,
	CONTROL_PLANE_HEADERS,
	parseJobSpec,
	toNotifyRequest,
} from "@remote-job-agent/shared";
import type { AgentConfig, Logger, ServerClient } from "./types/index.js";
import { ControlPlaneError, NotifyError, PollError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";

/**
 * Control-plane client over fetch.
 *
 * Every request is authenticated with the API key, names this agent in
 * X-Runner-Name and is aborted after the configured request timeout.
 */
export class ServerClientImpl implements ServerClient {
	private readonly serverUrl: string;
	private readonly apiKey: string;
	private readonly agentName: string;
	private readonly requestTimeoutMs: number;
	private readonly logger: Logger;

	constructor(config: AgentConfig, logger?: Logger) {
		this.serverUrl = config.serverUrl;
		this.apiKey = config.apiKey;
		this.agentName = config.agentName;
		this.requestTimeoutMs = config.requestTimeoutMs;
		this.logger = logger ?? new LoggerImpl("server-client");
	}

	async poll(capabilities: readonly string[]): Promise<JobSpec | null> {
		const body: PollRequest = { commands: [...capabilities] };

		this.logger.debug(`Polling from ${this.agentName}`);

		return this.post(CONTROL_PLANE_ENDPOINTS.POLL, body, PollError, async (response) => {
			if (response.status === 404) {
				this.logger.debug("No job available");
				return null;
			}

			if (!response.ok) {
				throw new PollError(`Polling error ${response.status}`, response.status);
			}

			let data: unknown;
			try {
				data = await response.json();
			} catch (err) {
				throw new PollError("Poll response is not valid JSON", response.status, { cause: err });
			}

			const job = parseJobSpec(data);
			if (!job) {
				throw new PollError("Poll response does not describe a job", response.status);
			}

			this.logger.info(`Received job ${job.id} (command=${job.command}, timeout=${job.timeoutSeconds}s)`);
			return job;
		});
	}

	async notify(payload: NotificationPayload): Promise<void> {
		const body = toNotifyRequest(payload);

		this.logger.debug(`Sending payload ${JSON.stringify(body)}`);

		await this.post(CONTROL_PLANE_ENDPOINTS.NOTIFY, body, NotifyError, async (response) => {
			if (!response.ok) {
				throw new NotifyError(`Notify error ${response.status}`, response.status);
			}
			this.logger.info(`Reported job ${payload.runId} (success=${payload.success})`);
		});
	}

	/**
	 * POST a JSON body and hand the response to `read` before the timeout is cleared,
	 * so reading the body is bounded too. Transport failures are wrapped in `ErrorType`.
	 */
	private async post<T>(
		path: string,
		body: unknown,
		ErrorType: new (message: string, status: number | null, options?: ErrorOptions) => ControlPlaneError,
		read: (response: Response) => Promise<T>,
	): Promise<T> {
		const url = `${this.serverUrl}${path}`;
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					[CONTROL_PLANE_HEADERS.AUTHORIZATION]: `${API_KEY_SCHEME} ${this.apiKey}`,
					[CONTROL_PLANE_HEADERS.RUNNER_NAME]: this.agentName,
					[CONTROL_PLANE_HEADERS.CONTENT_TYPE]: "application/json",
				},
				body: JSON.stringify(body),
				signal: controller.signal,
			});
			return await read(response);
		} catch (err) {
			if (err instanceof ControlPlaneError) {
				throw err;
			}
			if (err instanceof Error && err.name === "AbortError") {
				throw new ErrorType(`Request to ${url} timed out after ${this.requestTimeoutMs}ms`, null);
			}
			throw new ErrorType(`Request to ${url} failed`, null, { cause: err });
		} finally {
			clearTimeout(timeoutId);
		}
	}
}
