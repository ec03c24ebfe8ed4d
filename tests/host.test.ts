import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { BackupDeps } from "../src/backup";
import type { CommandResult } from "../src/exec";
import { BackupInProgressError } from "../src/errors";
import { BackupHost } from "../src/host";
import type { BackupSinks, RepositoryDescriptor } from "../src/types/backup";

const ok = (): CommandResult => ({
	ok: true,
	exitCode: 0,
	stdout: "",
	stderr: "",
	timedOut: false,
	error: "",
});

const createDeps = (urls: string[]): BackupDeps => ({
	listRepositories: async (_options, sinks: BackupSinks) => {
		sinks.log("Fetching repositories...");
		sinks.progress(0);
		sinks.log(`Found ${urls.length} repositories.`);
		sinks.progress(10);
		return urls.map((remoteUrl): RepositoryDescriptor => ({ remoteUrl }));
	},
	cloneRepository: async (_url, _localPath, options) => {
		options?.progressLogger?.("Receiving objects: 100% (3/3), done.");
		return ok();
	},
	pullRepository: async () => ok(),
});

const record = (host: BackupHost) => {
	const events: string[] = [];
	host.on("log", (message) => events.push(`log:${message}`));
	host.on("progress", (percent) => events.push(`progress:${percent}`));
	host.on("detail", (message) => events.push(`detail:${message}`));
	host.on("complete", (summary) => events.push(`complete:${summary.status}`));
	return events;
};

describe("BackupHost", () => {
	let cwd: string;

	beforeEach(async () => {
		cwd = await mkdtemp(path.join(tmpdir(), "repo-backup-host-"));
	});

	afterEach(async () => {
		await rm(cwd, { recursive: true, force: true });
	});

	it("relays engine events in order and completes once", async () => {
		const host = new BackupHost({
			deps: createDeps(["https://github.com/user/a", "https://github.com/user/b"]),
			env: {},
			cwd,
		});
		const events = record(host);

		const summary = await host.start("backups");

		expect(summary.destination).toBe(path.join(cwd, "backups"));
		expect(events).toEqual([
			"log:Fetching repositories...",
			"progress:0",
			"log:Found 2 repositories.",
			"progress:10",
			"log:Cloning a...",
			"detail:Receiving objects: 100% (3/3), done.",
			"progress:55",
			"log:Cloning b...",
			"detail:Receiving objects: 100% (3/3), done.",
			"progress:100",
			"log:Backup completed.",
			"progress:100",
			"complete:completed",
		]);
		expect(host.isRunning).toBe(false);
	});

	it("delivers nothing before start returns to the caller", async () => {
		const host = new BackupHost({ deps: createDeps([]), env: {}, cwd });
		const events = record(host);

		const running = host.start("backups");

		expect(events).toEqual([]);
		expect(host.isRunning).toBe(true);
		await running;
		expect(events.at(-1)).toBe("complete:empty");
	});

	it("refuses a second run while one is active", async () => {
		const host = new BackupHost({
			deps: createDeps(["https://github.com/user/a"]),
			env: {},
			cwd,
		});

		const first = host.start("backups");
		await expect(host.start("other")).rejects.toBeInstanceOf(
			BackupInProgressError,
		);
		await first;

		const again = await host.start("backups");
		expect(again.status).toBe("completed");
	});

	it("turns an engine crash into a failed completion", async () => {
		const host = new BackupHost({
			deps: {
				listRepositories: async () => {
					throw new Error("boom");
				},
			},
			env: {},
			cwd,
		});
		const events = record(host);

		const summary = await host.start("backups");

		expect(summary.status).toBe("failed");
		expect(summary.error).toBe("boom");
		expect(events).toEqual([
			"log:Backup failed: boom",
			"progress:100",
			"complete:failed",
		]);
	});

	it("still completes when a listener throws", async () => {
		const host = new BackupHost({ deps: createDeps([]), env: {}, cwd });
		const complete = vi.fn();
		host.on("log", () => {
			throw new Error("listener broke");
		});
		host.on("complete", complete);

		await expect(host.start("backups")).rejects.toThrow("listener broke");
		expect(complete).toHaveBeenCalledTimes(1);
		expect(host.isRunning).toBe(false);
	});

	it("reads the destination from the environment", async () => {
		const host = new BackupHost({
			deps: createDeps([]),
			env: { REPO_BACKUP_DEST: "from-env" },
			cwd,
		});

		const summary = await host.start({});

		expect(summary.destination).toBe(path.join(cwd, "from-env"));
	});
});
