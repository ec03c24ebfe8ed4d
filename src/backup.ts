import pc from "picocolors";

import { ensureDirectory, exists } from "./backup-fs";
import { symbols, ui } from "./cli/ui";
import { getErrnoCode, getErrorMessage } from "./errors";
import { redactRepoUrl } from "./git/redact";
import {
	cloneRepository,
	pullRepository,
	type TransferOptions,
} from "./git/transfer";
import { listRepositories } from "./github/list-repos";
import { displayPath } from "./paths";
import { percentFor, ProgressTracker } from "./progress";
import { resolveRepositories } from "./resolve-repo";
import type {
	BackupOptions,
	BackupPlan,
	BackupPlanEntry,
	BackupResult,
	BackupSinks,
	BackupSummary,
	ResolvedRepository,
	SkippedRepository,
} from "./types/backup";

export type BackupDeps = {
	listRepositories?: typeof listRepositories;
	cloneRepository?: typeof cloneRepository;
	pullRepository?: typeof pullRepository;
	exists?: typeof exists;
	ensureDirectory?: typeof ensureDirectory;
};

const describeSkip = (entry: SkippedRepository) => {
	const url = redactRepoUrl(entry.remoteUrl);
	return entry.reason === "duplicate-name"
		? `Skipping ${url}: ${entry.localName} is already taken by another repository.`
		: `Skipping ${url}: cannot derive a local name.`;
};

const skippedResult = (
	entry: SkippedRepository,
	destination: string,
): BackupResult => ({
	name: entry.localName,
	remoteUrl: entry.remoteUrl,
	localPath: destination,
	status: "skipped",
	error: entry.reason,
});

const transferRepository = async (
	repository: ResolvedRepository,
	sinks: BackupSinks,
	transferOptions: TransferOptions,
	deps: Required<BackupDeps>,
): Promise<BackupResult> => {
	const { localName, localPath, remoteUrl } = repository;
	const base = { name: localName, remoteUrl, localPath };
	if (await deps.exists(localPath)) {
		sinks.log(`Updating ${localName}...`);
		const result = await deps.pullRepository(localPath, transferOptions);
		if (!result.ok) {
			sinks.log(`Failed to update ${localName}: ${result.error}`);
			return {
				...base,
				action: "update",
				status: "failed",
				error: result.error,
			};
		}
		return { ...base, action: "update", status: "updated" };
	}
	sinks.log(`Cloning ${localName}...`);
	const result = await deps.cloneRepository(
		remoteUrl,
		localPath,
		transferOptions,
	);
	if (!result.ok) {
		sinks.log(`Failed to clone ${localName}: ${result.error}`);
		return {
			...base,
			action: "clone",
			status: "failed",
			error: result.error,
		};
	}
	return { ...base, action: "clone", status: "cloned" };
};

const withDefaults = (deps: BackupDeps): Required<BackupDeps> => ({
	listRepositories: deps.listRepositories ?? listRepositories,
	cloneRepository: deps.cloneRepository ?? cloneRepository,
	pullRepository: deps.pullRepository ?? pullRepository,
	exists: deps.exists ?? exists,
	ensureDirectory: deps.ensureDirectory ?? ensureDirectory,
});

/**
 * Mirror every listed repository into `options.destination`, cloning the
 * ones that are missing and pulling the ones already present.
 *
 * Repositories are processed one at a time in listing order. A failed
 * transfer is logged and recorded but does not stop the run.
 */
export const runBackup = async (
	options: BackupOptions,
	sinks: BackupSinks,
	deps: BackupDeps = {},
): Promise<BackupSummary> => {
	const resolvedDeps = withDefaults(deps);
	const tracker = new ProgressTracker(sinks.progress);
	const tracked: BackupSinks = {
		log: sinks.log,
		progress: (percent) => tracker.report(percent),
		detail: sinks.detail,
	};
	const destination = options.destination;

	try {
		await resolvedDeps.ensureDirectory(destination);
	} catch (error) {
		const code = getErrnoCode(error);
		const message =
			code === "EEXIST" || code === "ENOTDIR"
				? "not a directory"
				: getErrorMessage(error);
		tracked.log(
			`Cannot create destination ${displayPath(destination)}: ${message}`,
		);
		tracker.complete();
		return { destination, status: "failed", results: [], error: message };
	}

	const descriptors = await resolvedDeps.listRepositories(
		{
			owner: options.owner,
			limit: options.limit,
			timeoutMs: options.timeoutMs,
			verbose: options.verbose,
		},
		tracked,
	);
	if (descriptors.length === 0) {
		tracked.log("No repositories found.");
		tracker.complete();
		return { destination, status: "empty", results: [] };
	}

	const { repositories, skipped } = resolveRepositories(
		descriptors,
		destination,
	);
	const results: BackupResult[] = [];
	for (const entry of skipped) {
		tracked.log(describeSkip(entry));
		results.push(skippedResult(entry, destination));
	}

	const transferOptions: TransferOptions = {
		timeoutMs: options.timeoutMs,
		logger: options.verbose ? sinks.detail : undefined,
		progressLogger: sinks.detail,
	};
	const total = repositories.length;
	if (total === 0) {
		tracker.complete();
	}
	for (const [index, repository] of repositories.entries()) {
		const result = await transferRepository(
			repository,
			tracked,
			transferOptions,
			resolvedDeps,
		);
		results.push(result);
		tracker.report(percentFor(index + 1, total));
	}

	tracked.log("Backup completed.");
	tracker.complete();
	return { destination, status: "completed", results };
};

/**
 * Resolve what a run would do without transferring anything.
 */
export const planBackup = async (
	options: BackupOptions,
	sinks: BackupSinks,
	deps: BackupDeps = {},
): Promise<BackupPlan> => {
	const resolvedDeps = withDefaults(deps);
	const descriptors = await resolvedDeps.listRepositories(
		{
			owner: options.owner,
			limit: options.limit,
			timeoutMs: options.timeoutMs,
			verbose: options.verbose,
		},
		sinks,
	);
	const { repositories, skipped } = resolveRepositories(
		descriptors,
		options.destination,
	);
	const entries: BackupPlanEntry[] = [];
	for (const repository of repositories) {
		const present = await resolvedDeps.exists(repository.localPath);
		entries.push({ ...repository, action: present ? "update" : "clone" });
	}
	return { destination: options.destination, entries, skipped };
};

export const countResults = (summary: BackupSummary) => ({
	cloned: summary.results.filter((r) => r.status === "cloned").length,
	updated: summary.results.filter((r) => r.status === "updated").length,
	failed: summary.results.filter((r) => r.status === "failed").length,
	skipped: summary.results.filter((r) => r.status === "skipped").length,
});

export const printBackupPlan = (plan: BackupPlan) => {
	const clones = plan.entries.filter((entry) => entry.action === "clone");
	ui.line(
		`${symbols.info} ${plan.entries.length} repositories into ${ui.path(plan.destination)} (${clones.length} to clone, ${plan.entries.length - clones.length} to update)`,
	);
	for (const entry of plan.entries) {
		ui.item(
			entry.action === "clone" ? pc.green("+") : pc.cyan("↻"),
			entry.localName,
			`${entry.action} ${redactRepoUrl(entry.remoteUrl)}`,
		);
	}
	for (const entry of plan.skipped) {
		ui.item(symbols.warn, entry.localName || "-", describeSkip(entry));
	}
};

export const printBackupSummary = (summary: BackupSummary) => {
	const counts = countResults(summary);
	const icon =
		summary.status === "failed" || counts.failed > 0
			? symbols.warn
			: symbols.success;
	ui.line(
		`${icon} ${summary.results.length} repositories in ${ui.path(summary.destination)} (${counts.cloned} cloned, ${counts.updated} updated, ${counts.failed} failed, ${counts.skipped} skipped)`,
	);
	for (const result of summary.results) {
		if (result.status !== "failed") continue;
		ui.item(symbols.error, result.name, result.error);
	}
};
