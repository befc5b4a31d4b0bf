/**
 * Mock Control Plane for E2E Tests
 *
 * In-process Express server speaking the agent's wire protocol.
 * Hands out queued jobs from POST /pop (404 when the queue is empty),
 * records every poll and notification, and can be told to fail either endpoint.
 */

import express, { type Request, type Response } from "express";
import type * as http from "node:http";
import { CONTROL_PLANE_ENDPOINTS, CONTROL_PLANE_HEADERS, type PollResponse } from "@remote-job-agent/shared";

/**
 * A request received by the control plane, with the agent's identifying headers.
 */
export interface RecordedRequest {
	body: unknown;
	authorization: string | undefined;
	runnerName: string | undefined;
}

export interface MockControlPlane {
	url: string;
	/** Queue a job for the next poll */
	enqueue(job: PollResponse): void;
	getPolls(): RecordedRequest[];
	getNotifications(): RecordedRequest[];
	/** Answer every poll with this status, or hand out jobs again with null */
	setPollStatus(status: number | null): void;
	setNotifyStatus(status: number): void;
	close(): Promise<void>;
}

function record(req: Request): RecordedRequest {
	return {
		body: req.body,
		authorization: req.get(CONTROL_PLANE_HEADERS.AUTHORIZATION),
		runnerName: req.get(CONTROL_PLANE_HEADERS.RUNNER_NAME),
	};
}

/**
 * Start a mock control plane on an ephemeral port.
 */
export async function createMockControlPlane(): Promise<MockControlPlane> {
	const queue: PollResponse[] = [];
	const polls: RecordedRequest[] = [];
	const notifications: RecordedRequest[] = [];
	let pollStatus: number | null = null;
	let notifyStatus = 204;

	const app = express();
	app.use(express.json());

	app.post(CONTROL_PLANE_ENDPOINTS.POLL, (req: Request, res: Response): void => {
		polls.push(record(req));

		if (pollStatus !== null) {
			res.status(pollStatus).json({ error: "Injected poll failure" });
			return;
		}

		const job = queue.shift();
		if (!job) {
			res.status(404).json({ error: "No job available" });
			return;
		}
		res.status(200).json(job);
	});

	app.post(CONTROL_PLANE_ENDPOINTS.NOTIFY, (req: Request, res: Response): void => {
		notifications.push(record(req));
		res.status(notifyStatus).end();
	});

	const server = await new Promise<http.Server>((resolve, reject) => {
		const httpServer = app.listen(0, "127.0.0.1", () => resolve(httpServer));
		httpServer.on("error", reject);
	});

	const address = server.address();
	if (!address || typeof address === "string") {
		throw new Error("Failed to get control plane address");
	}

	return {
		url: `http://127.0.0.1:${address.port}`,
		enqueue: (job) => {
			queue.push(job);
		},
		getPolls: () => [...polls],
		getNotifications: () => [...notifications],
		setPollStatus: (status) => {
			pollStatus = status;
		},
		setNotifyStatus: (status) => {
			notifyStatus = status;
		},
		close: async () => {
			// Agents keep connections alive between polls
			server.closeAllConnections();
			await new Promise<void>((resolve, reject) => {
				server.close((err) => {
					if (err) reject(err);
					else resolve();
				});
			});
		},
	};
}
