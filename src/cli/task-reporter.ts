import pc from "picocolors";
import { createLiveOutput, type LiveOutput } from "./live-output";
import { isSilentMode, symbols, ui } from "./ui";

export type LogLevel = "error" | "warn" | "step" | "success" | "info";

const formatDuration = (ms: number) => {
	const seconds = Math.max(0, ms / 1000);
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = seconds % 60;
	return `${minutes}m ${remainder.toFixed(1)}s`;
};

export const classifyLogLine = (message: string): LogLevel => {
	if (
		message.startsWith("Error ") ||
		message.startsWith("Failed ") ||
		message.startsWith("Cannot ") ||
		message.startsWith("Backup failed")
	) {
		return "error";
	}
	if (
		message.startsWith("Skipping ") ||
		message.startsWith("No repositories")
	) {
		return "warn";
	}
	if (message.startsWith("Cloning ") || message.startsWith("Updating ")) {
		return "step";
	}
	if (message.startsWith("Backup completed")) {
		return "success";
	}
	return "info";
};

const ICONS: Record<LogLevel, string> = {
	error: symbols.error,
	warn: symbols.warn,
	step: pc.cyan("→"),
	success: symbols.success,
	info: symbols.info,
};

export const renderProgressBar = (percent: number, width = 24) => {
	const bounded = Math.min(Math.max(percent, 0), 100);
	const filled = Math.round((bounded / 100) * width);
	return `${"█".repeat(filled)}${"░".repeat(width - filled)} ${ui.percent(bounded)}`;
};

export type TaskReporterOptions = {
	maxLiveLines?: number;
	output?: LiveOutput;
	interactive?: boolean;
	/** Print command output lines when there is no live region to show them in. */
	verbose?: boolean;
};

/**
 * Renders log lines, the progress bar and git's own progress output of a
 * backup run. Without a TTY it degrades to one printed line per log entry.
 */
export class TaskReporter {
	private readonly output: LiveOutput | null;
	private readonly maxLiveLines: number;
	private readonly verbose: boolean;
	private readonly startTime = Date.now();
	private readonly liveLines: string[] = [];
	private timer: NodeJS.Timeout | null = null;
	private percent = 0;
	private warnings = 0;
	private errors = 0;

	constructor(options: TaskReporterOptions = {}) {
		const interactive =
			options.interactive ?? (Boolean(process.stdout.isTTY) && !isSilentMode());
		this.output = interactive ? (options.output ?? createLiveOutput()) : null;
		this.maxLiveLines = options.maxLiveLines ?? 4;
		this.verbose = options.verbose ?? false;
		this.startTimer();
	}

	log(message: string) {
		const level = classifyLogLine(message);
		if (level === "error") this.errors += 1;
		if (level === "warn") this.warnings += 1;
		if (level === "step") this.liveLines.length = 0;
		const line = `${ICONS[level]} ${message}`;
		if (!this.output) {
			if (level === "error") {
				process.stderr.write(`${line}\n`);
			} else {
				ui.line(line);
			}
			return;
		}
		this.output.print(line);
		this.render();
	}

	progress(percent: number) {
		this.percent = percent;
		this.render();
	}

	detail(text: string) {
		if (!this.output) {
			if (this.verbose) ui.line(pc.dim(`  ${text}`));
			return;
		}
		this.liveLines.push(pc.dim(`  ${text}`));
		if (this.liveLines.length > this.maxLiveLines) {
			this.liveLines.splice(0, this.liveLines.length - this.maxLiveLines);
		}
		this.render();
	}

	finish() {
		this.liveLines.length = 0;
		this.stopTimer();
		const parts = [
			`Completed in ${formatDuration(Date.now() - this.startTime)}`,
			this.warnings
				? `${this.warnings} warning${this.warnings === 1 ? "" : "s"}`
				: null,
			this.errors
				? `${this.errors} error${this.errors === 1 ? "" : "s"}`
				: null,
		].filter((part): part is string => part !== null);
		const footer = pc.dim(parts.join(" · "));
		if (!this.output) {
			ui.line(footer);
			return;
		}
		this.output.persist([renderProgressBar(this.percent), footer]);
	}

	stop() {
		this.output?.stop();
		this.stopTimer();
	}

	private render() {
		if (!this.output) return;
		this.output.render(this.composeView());
	}

	private startTimer() {
		if (!this.output) return;
		this.timer = setInterval(() => this.render(), 250);
		this.timer.unref?.();
	}

	private stopTimer() {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
	}

	private composeView() {
		const elapsed = pc.dim(
			`time: ${formatDuration(Date.now() - this.startTime)}`,
		);
		return [
			`${renderProgressBar(this.percent)} ${elapsed}`,
			...this.liveLines,
		];
	}
}
