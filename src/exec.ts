import { execa } from "execa";

import { getErrorMessage } from "./errors";
import { redactRepoUrl } from "./git/redact";

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

export type CommandLoggers = {
	logger?: (message: string) => void;
	progressLogger?: (message: string) => void;
	progressThrottleMs?: number;
};

export type CommandOptions = CommandLoggers & {
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	timeoutMs?: number;
};

export type CommandResult = {
	ok: boolean;
	exitCode: number | null;
	stdout: string;
	stderr: string;
	timedOut: boolean;
	/** Short description of the failure, empty when the command succeeded. */
	error: string;
};

type CommandOutcome = {
	exitCode?: number;
	stdout?: unknown;
	stderr?: unknown;
	failed?: boolean;
	timedOut?: boolean;
	shortMessage?: string;
};

const isProgressLine = (line: string) =>
	line.includes("Receiving objects") ||
	line.includes("Resolving deltas") ||
	line.includes("Compressing objects") ||
	line.includes("Updating files") ||
	line.includes("Counting objects");

const shouldEmitProgress = (
	line: string,
	now: number,
	lastProgressAt: number,
	throttleMs: number,
) =>
	now - lastProgressAt >= throttleMs ||
	line.includes("100%") ||
	line.includes("done");

type OutputStreams = {
	stdout?: NodeJS.ReadableStream | null;
	stderr?: NodeJS.ReadableStream | null;
};

const attachLoggers = (
	subprocess: OutputStreams,
	commandLabel: string,
	options: CommandLoggers,
) => {
	if (!options.logger && !options.progressLogger) {
		return;
	}
	let lastProgressAt = 0;
	const forward = (stream: NodeJS.ReadableStream | null | undefined) => {
		if (!stream) return;
		stream.on("data", (chunk: unknown) => {
			const text =
				chunk instanceof Buffer ? chunk.toString("utf8") : String(chunk);
			for (const line of text.split(/\r?\n|\r/)) {
				if (!line) continue;
				options.logger?.(`${commandLabel} | ${redactRepoUrl(line)}`);
				if (!options.progressLogger) continue;
				if (!isProgressLine(line)) continue;
				const now = Date.now();
				const throttleMs = options.progressThrottleMs ?? 120;
				if (shouldEmitProgress(line, now, lastProgressAt, throttleMs)) {
					lastProgressAt = now;
					options.progressLogger(line);
				}
			}
		});
	};
	forward(subprocess.stdout);
	forward(subprocess.stderr);
};

const asText = (value: unknown) => (typeof value === "string" ? value : "");

export const toCommandResult = (outcome: CommandOutcome): CommandResult => {
	const stderr = asText(outcome.stderr).trim();
	const exitCode = outcome.exitCode ?? null;
	const ok = !outcome.failed && exitCode === 0;
	let error = "";
	if (!ok) {
		if (outcome.timedOut) {
			error = "timed out";
		} else if (stderr) {
			error = stderr;
		} else if (outcome.shortMessage) {
			error = outcome.shortMessage;
		} else {
			error = `exited with code ${exitCode ?? "unknown"}`;
		}
	}
	return {
		ok,
		exitCode,
		stdout: asText(outcome.stdout),
		stderr,
		timedOut: Boolean(outcome.timedOut),
		error: redactRepoUrl(error),
	};
};

/**
 * Run an external command to completion. A non-zero exit, a timeout or a
 * failure to spawn are reported in the result instead of being thrown.
 */
export const runCommand = async (
	command: string,
	args: string[],
	options: CommandOptions = {},
): Promise<CommandResult> => {
	const commandLabel = redactRepoUrl([command, ...args].join(" "));
	options.logger?.(commandLabel);
	try {
		const subprocess = execa(command, args, {
			cwd: options.cwd,
			env: options.env,
			timeout: options.timeoutMs,
			maxBuffer: DEFAULT_MAX_BUFFER,
			stdin: "ignore",
			stdout: "pipe",
			stderr: "pipe",
			reject: false,
		});
		attachLoggers(subprocess, commandLabel, options);
		return toCommandResult(await subprocess);
	} catch (error) {
		return toCommandResult({
			failed: true,
			shortMessage: getErrorMessage(error),
		});
	}
};
