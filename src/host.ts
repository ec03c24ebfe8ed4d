import { EventEmitter } from "node:events";

import { type BackupDeps, runBackup } from "./backup";
import { EventChannel } from "./channel";
import { type BackupOptionsInput, loadBackupOptions } from "./config";
import { BackupInProgressError, getErrorMessage } from "./errors";
import { COMPLETE } from "./progress";
import type {
	BackupEvent,
	BackupOptions,
	BackupSinks,
	BackupSummary,
} from "./types/backup";

export type BackupHostOptions = {
	deps?: BackupDeps;
	env?: NodeJS.ProcessEnv;
	cwd?: string;
};

// Yield once so the run starts after `start` has returned to its caller.
const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

export interface BackupHost {
	on(event: "log", listener: (message: string) => void): this;
	on(event: "progress", listener: (percent: number) => void): this;
	on(event: "detail", listener: (message: string) => void): this;
	on(event: "complete", listener: (summary: BackupSummary) => void): this;
	once(event: "complete", listener: (summary: BackupSummary) => void): this;
	off(event: "log" | "detail", listener: (message: string) => void): this;
	off(event: "progress", listener: (percent: number) => void): this;
	off(event: "complete", listener: (summary: BackupSummary) => void): this;
}

/**
 * Runs backups as background tasks and relays their events to listeners in
 * the order the engine produced them. Each run ends with exactly one
 * `complete` event, also when the engine itself throws.
 */
export class BackupHost extends EventEmitter {
	private readonly deps: BackupDeps;
	private readonly env: NodeJS.ProcessEnv;
	private readonly cwd: string;
	private activeDestination: string | null = null;

	constructor(options: BackupHostOptions = {}) {
		super();
		this.deps = options.deps ?? {};
		this.env = options.env ?? process.env;
		this.cwd = options.cwd ?? process.cwd();
	}

	get isRunning() {
		return this.activeDestination !== null;
	}

	async start(input: BackupOptionsInput | string): Promise<BackupSummary> {
		if (this.activeDestination !== null) {
			throw new BackupInProgressError(this.activeDestination);
		}
		const options = loadBackupOptions(
			typeof input === "string" ? { destination: input } : input,
			this.env,
			this.cwd,
		);
		this.activeDestination = options.destination;

		const channel = new EventChannel<BackupEvent>();
		const task = this.runInBackground(options, channel);
		try {
			return await this.relay(channel);
		} finally {
			await task;
		}
	}

	private async runInBackground(
		options: BackupOptions,
		channel: EventChannel<BackupEvent>,
	) {
		const sinks: BackupSinks = {
			log: (message) => channel.push({ type: "log", message }),
			progress: (percent) => channel.push({ type: "progress", percent }),
			detail: (message) => channel.push({ type: "detail", message }),
		};
		let summary: BackupSummary;
		try {
			await nextTurn();
			summary = await runBackup(options, sinks, this.deps);
		} catch (error) {
			const message = getErrorMessage(error);
			sinks.log(`Backup failed: ${message}`);
			sinks.progress(COMPLETE);
			summary = {
				destination: options.destination,
				status: "failed",
				results: [],
				error: message,
			};
		}
		channel.push({ type: "complete", summary });
		channel.close();
	}

	private async relay(
		channel: EventChannel<BackupEvent>,
	): Promise<BackupSummary> {
		let summary: BackupSummary | null = null;
		const listenerErrors: unknown[] = [];
		const deliver = (name: BackupEvent["type"], payload: unknown) => {
			try {
				this.emit(name, payload);
			} catch (error) {
				listenerErrors.push(error);
			}
		};
		for await (const event of channel) {
			switch (event.type) {
				case "log":
				case "detail":
					deliver(event.type, event.message);
					break;
				case "progress":
					deliver("progress", event.percent);
					break;
				case "complete":
					summary = event.summary;
					this.activeDestination = null;
					deliver("complete", event.summary);
					break;
			}
		}
		if (listenerErrors.length > 0) {
			throw listenerErrors[0];
		}
		if (!summary) {
			this.activeDestination = null;
			throw new Error("Backup ended without a completion event.");
		}
		return summary;
	}
}
