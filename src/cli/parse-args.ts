import process from "node:process";

import cac from "cac";
import type { CliOptions } from "./types";

export const CLI_NAME = "repo-backup";

const COMMANDS = ["run", "plan"] as const;
type Command = (typeof COMMANDS)[number];

export type ParsedArgs = {
	command: Command;
	options: CliOptions;
	help: boolean;
};

const VALUE_FLAGS = new Set(["--dest", "--owner", "--limit", "--timeout-ms"]);

const isCommand = (value: string): value is Command =>
	COMMANDS.some((command) => command === value);

const collectPositionals = (rawArgs: string[]) => {
	const positionals: string[] = [];
	for (let index = 0; index < rawArgs.length; index += 1) {
		const arg = rawArgs[index];
		if (arg === "--") {
			positionals.push(...rawArgs.slice(index + 1));
			break;
		}
		if (arg.startsWith("-")) {
			const [flag] = arg.split("=");
			if (VALUE_FLAGS.has(flag) && !arg.includes("=")) {
				index += 1;
			}
			continue;
		}
		positionals.push(arg);
	}
	return positionals;
};

const optionalString = (value: unknown, flag: string) => {
	if (value === undefined) {
		return undefined;
	}
	if (typeof value === "number") {
		return String(value);
	}
	if (typeof value !== "string" || value.length === 0) {
		throw new Error(`${flag} expects a value.`);
	}
	return value;
};

const optionalPositiveInt = (value: unknown, flag: string) => {
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new Error(`${flag} must be a positive integer.`);
	}
	return parsed;
};

const buildOptions = (
	raw: Record<string, unknown>,
	destination: string | undefined,
): CliOptions => {
	const dest = optionalString(raw.dest, "--dest");
	if (dest !== undefined && destination !== undefined) {
		throw new Error("Pass the destination either as --dest or positionally.");
	}
	return {
		dest: dest ?? destination,
		owner: optionalString(raw.owner, "--owner"),
		limit: optionalPositiveInt(raw.limit, "--limit"),
		timeoutMs: optionalPositiveInt(raw.timeoutMs, "--timeout-ms"),
		dryRun: Boolean(raw.dryRun),
		json: Boolean(raw.json),
		silent: Boolean(raw.silent),
		verbose: Boolean(raw.verbose),
	};
};

/**
 * Parse `argv` (including the node and script entries). A bare invocation
 * runs a backup; `--dry-run` turns it into `plan`.
 */
export const parseArgs = (argv = process.argv): ParsedArgs => {
	const cli = cac(CLI_NAME);

	cli
		.option("--dest <path>", "Directory that receives the working trees")
		.option("--owner <name>", "List repositories of this user or organization")
		.option("--limit <n>", "Maximum number of repositories to list")
		.option("--timeout-ms <n>", "Timeout for each gh or git command")
		.option("--dry-run", "Show what would be cloned or updated")
		.option("--json", "Output JSON")
		.option("--silent", "Suppress non-error output")
		.option("--verbose", "Show the output of gh and git")
		.help();

	cli.command("run [destination]", "Clone or update every repository");
	cli.command("plan [destination]", "Show what a run would do");

	const result = cli.parse(argv, { run: false });
	const positionals = collectPositionals(argv.slice(2));

	let command: Command = "run";
	let rest = positionals;
	const first = positionals[0];
	if (first !== undefined && isCommand(first)) {
		command = first;
		rest = positionals.slice(1);
	}
	if (rest.length > 1) {
		throw new Error(`Unexpected arguments: ${rest.slice(1).join(" ")}.`);
	}
	const options = buildOptions(result.options, rest[0]);
	if (options.dryRun) {
		command = "plan";
	}

	return {
		command,
		options,
		help: Boolean(result.options.help),
	};
};
