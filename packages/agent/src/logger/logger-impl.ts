import type { Logger } from "../types/index.js";
import { LOG_LEVELS, type LogLevel, getCurrentLevel } from "./log-level.js";

type MessageLevel = Exclude<LogLevel, "silent">;

const LEVEL_LABELS: Record<MessageLevel, string> = {
	debug: "DEBUG",
	info: "INFO ",
	warn: "WARN ",
	error: "ERROR",
};

/**
 * Format one log line as `[timestamp] [LEVEL] [prefix] message`.
 */
export function formatLogLine(level: MessageLevel, prefix: string, message: string, at: Date = new Date()): string {
	return `[${at.toISOString()}] [${LEVEL_LABELS[level]}] [${prefix}] ${message}`;
}

/**
 * Component logger writing to stdout.
 * The threshold is read on every call, so setLogLevel applies to existing loggers.
 */
export class LoggerImpl implements Logger {
	constructor(private readonly prefix: string) {}

	debug(message: string): void {
		this.write("debug", message);
	}

	info(message: string): void {
		this.write("info", message);
	}

	warn(message: string): void {
		this.write("warn", message);
	}

	error(message: string): void {
		this.write("error", message);
	}

	private write(level: MessageLevel, message: string): void {
		if (LOG_LEVELS[level] < LOG_LEVELS[getCurrentLevel()]) {
			return;
		}
		console.log(formatLogLine(level, this.prefix, message));
	}
}
