import * as z from "zod";

import { getErrorMessage } from "../errors";
import { runCommand } from "../exec";
import { buildGitEnv, resolveGhCommand } from "../git/git-env";
import { COMPLETE, LISTING_DONE, LISTING_START } from "../progress";
import type { BackupSinks, RepositoryDescriptor } from "../types/backup";

export const MAX_LISTING_LIMIT = 1000;

const ListingSchema = z.array(z.object({ url: z.string().min(1) }));

export type ListRepositoriesOptions = {
	owner?: string;
	limit?: number;
	timeoutMs?: number;
	verbose?: boolean;
};

export const buildListArgs = (options: ListRepositoriesOptions = {}) => [
	"repo",
	"list",
	...(options.owner ? [options.owner] : []),
	"--json",
	"url",
	"--limit",
	String(options.limit ?? MAX_LISTING_LIMIT),
];

const describeIssues = (error: z.ZodError) =>
	error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		)
		.join("; ");

export type DecodeResult =
	| { ok: true; repositories: RepositoryDescriptor[] }
	| { ok: false; error: string };

export const decodeListing = (stdout: string): DecodeResult => {
	let raw: unknown;
	try {
		raw = JSON.parse(stdout);
	} catch (error) {
		return { ok: false, error: getErrorMessage(error) };
	}
	const parsed = ListingSchema.safeParse(raw);
	if (!parsed.success) {
		return { ok: false, error: describeIssues(parsed.error) };
	}
	return {
		ok: true,
		repositories: parsed.data.map((entry) => ({ remoteUrl: entry.url })),
	};
};

/**
 * List the account's repositories through `gh repo list`.
 *
 * Failures never throw: they are logged, progress jumps to completion and an
 * empty list is returned.
 */
export const listRepositories = async (
	options: ListRepositoriesOptions,
	sinks: BackupSinks,
): Promise<RepositoryDescriptor[]> => {
	sinks.log("Fetching repositories...");
	sinks.progress(LISTING_START);

	const result = await runCommand(resolveGhCommand(), buildListArgs(options), {
		env: buildGitEnv(),
		timeoutMs: options.timeoutMs,
		logger: options.verbose ? sinks.detail : undefined,
	});

	if (!result.ok) {
		sinks.log(`Error fetching repositories: ${result.error}`);
		sinks.progress(COMPLETE);
		return [];
	}

	const decoded = decodeListing(result.stdout);
	if (!decoded.ok) {
		sinks.log(`Failed to parse JSON: ${decoded.error}`);
		sinks.progress(COMPLETE);
		return [];
	}

	const count = decoded.repositories.length;
	sinks.log(`Found ${count} ${count === 1 ? "repository" : "repositories"}.`);
	sinks.progress(LISTING_DONE);
	return decoded.repositories;
};
