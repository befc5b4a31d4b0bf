/**
 * CLI argument parsing for agent configuration.
 * Numeric flags are kept raw so that unparsable values can be reported.
 */

export interface ParsedArgs {
	serverUrl?: string;
	apiKey?: string;
	runner?: string;
	agentName?: string;
	pollInterval?: string;
	defaultTimeout?: string;
}

const FLAGS: ReadonlyArray<[prefix: string, key: keyof ParsedArgs]> = [
	["--server-url=", "serverUrl"],
	["--api-key=", "apiKey"],
	["--runner=", "runner"],
	["--agent-name=", "agentName"],
	["--poll-interval=", "pollInterval"],
	["--default-timeout=", "defaultTimeout"],
];

export function parseCliArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = {};

	for (const arg of args) {
		for (const [prefix, key] of FLAGS) {
			if (arg.startsWith(prefix)) {
				parsed[key] = arg.slice(prefix.length);
				break;
			}
		}
	}

	return parsed;
}
