import process from "node:process";
import {
	countResults,
	planBackup,
	printBackupPlan,
	printBackupSummary,
} from "../backup";
import { type BackupOptionsInput, loadBackupOptions } from "../config";
import { ConfigError, getErrorMessage } from "../errors";
import { BackupHost } from "../host";
import type { BackupSinks } from "../types/backup";
import { ExitCode } from "./exit-code";
import { CLI_NAME, type ParsedArgs, parseArgs } from "./parse-args";
import { TaskReporter } from "./task-reporter";
import type { CliOptions } from "./types";
import { setSilentMode, symbols } from "./ui";

const printError = (message: string) => {
	process.stderr.write(`${symbols.error} ${message}\n`);
};

const toOptionsInput = (options: CliOptions): BackupOptionsInput => ({
	destination: options.dest,
	owner: options.owner,
	limit: options.limit,
	timeoutMs: options.timeoutMs,
	verbose: options.verbose,
});

const writeJson = (value: unknown) => {
	process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

const reporterSinks = (
	reporter: TaskReporter | null,
): Required<BackupSinks> => ({
	log: (message) => reporter?.log(message),
	progress: (percent) => reporter?.progress(percent),
	detail: (message) => reporter?.detail(message),
});

const runPlan = async (options: CliOptions) => {
	const backupOptions = loadBackupOptions(toOptionsInput(options));
	const reporter = options.json
		? null
		: new TaskReporter({ interactive: false, verbose: options.verbose });
	const plan = await planBackup(backupOptions, reporterSinks(reporter));
	if (options.json) {
		writeJson(plan);
		return;
	}
	printBackupPlan(plan);
};

const runBackupCommand = async (options: CliOptions) => {
	const reporter = options.json
		? null
		: new TaskReporter({ verbose: options.verbose });
	const host = new BackupHost();
	const sinks = reporterSinks(reporter);
	host.on("log", sinks.log);
	host.on("progress", sinks.progress);
	host.on("detail", sinks.detail);
	try {
		const summary = await host.start(toOptionsInput(options));
		reporter?.finish();
		if (options.json) {
			writeJson(summary);
		} else {
			printBackupSummary(summary);
		}
		if (summary.status === "failed" || countResults(summary).failed > 0) {
			process.exitCode = ExitCode.FatalError;
		}
	} finally {
		reporter?.stop();
	}
};

const runCommand = async (parsed: ParsedArgs) => {
	if (parsed.command === "plan") {
		await runPlan(parsed.options);
		return;
	}
	await runBackupCommand(parsed.options);
};

/**
 * The main entry point of the CLI
 */
export async function main(argv = process.argv): Promise<void> {
	process.on("uncaughtException", errorHandler);
	process.on("unhandledRejection", errorHandler);

	let parsed: ParsedArgs;
	try {
		parsed = parseArgs(argv);
	} catch (error) {
		printError(`${CLI_NAME}: ${getErrorMessage(error)}`);
		process.exit(ExitCode.InvalidArgument);
	}

	// cac prints the help text itself
	if (parsed.help) {
		process.exit(ExitCode.Success);
	}

	setSilentMode(parsed.options.silent || parsed.options.json);

	try {
		await runCommand(parsed);
	} catch (error) {
		if (error instanceof ConfigError) {
			printError(`${CLI_NAME}: ${error.message}`);
			process.exit(ExitCode.InvalidArgument);
		}
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	printError(getErrorMessage(error));
	process.exit(ExitCode.FatalError);
}
