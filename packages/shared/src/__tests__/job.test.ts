import { describe, expect, it } from "vitest";
import type { JobSpec, RunOutcome } from "../types/job.js";
import { FAILED_OUTPUT, toNotificationPayload } from "../types/job.js";
import { isPollResponse, parseCapabilityList, parseJobSpec, toNotifyRequest } from "../types/api.js";

describe("Job Types", () => {
	const job: JobSpec = { id: "r1", command: "echo", input: "hi", timeoutSeconds: 5 };

	describe("toNotificationPayload", () => {
		it("keys a successful outcome by the job id", () => {
			const outcome: RunOutcome = { succeeded: true, output: "hi", diagnostics: "" };

			expect(toNotificationPayload(job, outcome)).toEqual({
				runId: "r1",
				success: true,
				output: "hi",
				logs: "",
			});
		});

		it("carries the failure sentinel and the diagnostics of a failed outcome", () => {
			const outcome: RunOutcome = { succeeded: false, output: FAILED_OUTPUT, diagnostics: "boom\n" };

			expect(toNotificationPayload(job, outcome)).toEqual({
				runId: "r1",
				success: false,
				output: null,
				logs: "boom\n",
			});
		});
	});

	describe("toNotifyRequest", () => {
		it("renames runId to run_id", () => {
			const body = toNotifyRequest({ runId: "r2", success: false, output: null, logs: "err" });

			expect(body).toEqual({ run_id: "r2", success: false, output: null, logs: "err" });
		});
	});

	describe("parseJobSpec", () => {
		it("maps timeout to timeoutSeconds", () => {
			expect(parseJobSpec({ id: "r1", command: "echo", input: "hi", timeout: 5 })).toEqual(job);
		});

		it("defaults a missing timeout to 0", () => {
			expect(parseJobSpec({ id: "r3", command: "echo", input: "x" })?.timeoutSeconds).toBe(0);
		});

		it("JSON-encodes a non-string input", () => {
			const parsed = parseJobSpec({ id: "r4", command: "sum", input: { a: 1, b: [2] }, timeout: 0 });

			expect(parsed?.input).toBe("{\"a\":1,\"b\":[2]}");
		});

		it("uses an empty input when none is given", () => {
			expect(parseJobSpec({ id: "r5", command: "ping" })?.input).toBe("");
		});

		it("returns null for bodies that do not describe a job", () => {
			expect(parseJobSpec(null)).toBeNull();
			expect(parseJobSpec([])).toBeNull();
			expect(parseJobSpec({ command: "echo" })).toBeNull();
			expect(parseJobSpec({ id: 7, command: "echo" })).toBeNull();
			expect(parseJobSpec({ id: "r6", command: "echo", timeout: -1 })).toBeNull();
			expect(parseJobSpec({ id: "r7", command: "echo", timeout: 1.5 })).toBeNull();
			expect(parseJobSpec({ id: "r8", command: "echo", timeout: "5" })).toBeNull();
		});
	});

	describe("isPollResponse", () => {
		it("accepts a minimal job body", () => {
			expect(isPollResponse({ id: "a", command: "b" })).toBe(true);
		});

		it("accepts a timeout up to the longest timer delay", () => {
			expect(isPollResponse({ id: "a", command: "b", timeout: 2147483 })).toBe(true);
		});

		it("rejects a timeout longer than a timer can wait", () => {
			expect(isPollResponse({ id: "a", command: "b", timeout: 2147484 })).toBe(false);
			expect(isPollResponse({ id: "a", command: "b", timeout: 2_200_000 })).toBe(false);
		});
	});

	describe("parseCapabilityList", () => {
		it("parses a JSON array of command names", () => {
			expect(parseCapabilityList("[\"echo\",\"sleep\"]\n")).toEqual(["echo", "sleep"]);
		});

		it("accepts an empty list", () => {
			expect(parseCapabilityList("[]")).toEqual([]);
		});

		it("returns null for non-JSON output", () => {
			expect(parseCapabilityList("echo sleep")).toBeNull();
		});

		it("returns null when the array holds non-strings", () => {
			expect(parseCapabilityList("[\"echo\", 3]")).toBeNull();
			expect(parseCapabilityList("{\"echo\":true}")).toBeNull();
		});
	});
});
