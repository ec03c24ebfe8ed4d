import path from "node:path";
import type {
	RepositoryDescriptor,
	ResolvedRepository,
	SkippedRepository,
} from "./types/backup";

/**
 * Derive the working tree name for a remote URL: the last path segment, with
 * a trailing `.git` removed. The suffix match is exact and case-sensitive.
 */
export const resolveLocalName = (remoteUrl: string) => {
	const segment = remoteUrl.trim().split("/").filter(Boolean).pop() ?? "";
	return segment.endsWith(".git") ? segment.slice(0, -".git".length) : segment;
};

export const resolveRepository = (
	descriptor: RepositoryDescriptor,
	destinationPath: string,
): ResolvedRepository => {
	const localName = resolveLocalName(descriptor.remoteUrl);
	return {
		remoteUrl: descriptor.remoteUrl,
		localName,
		localPath: path.join(destinationPath, localName),
	};
};

// A name that resolves onto the destination itself or leaves it is unusable.
const isUsableName = (localName: string) =>
	localName.length > 0 &&
	localName !== "." &&
	localName !== ".." &&
	!localName.includes(path.sep) &&
	!localName.includes("\\");

export const resolveRepositories = (
	descriptors: readonly RepositoryDescriptor[],
	destinationPath: string,
) => {
	const repositories: ResolvedRepository[] = [];
	const skipped: SkippedRepository[] = [];
	const claimed = new Set<string>();
	for (const descriptor of descriptors) {
		const resolved = resolveRepository(descriptor, destinationPath);
		if (!isUsableName(resolved.localName)) {
			skipped.push({
				remoteUrl: resolved.remoteUrl,
				localName: resolved.localName,
				reason: "empty-name",
			});
			continue;
		}
		if (claimed.has(resolved.localName)) {
			skipped.push({
				remoteUrl: resolved.remoteUrl,
				localName: resolved.localName,
				reason: "duplicate-name",
			});
			continue;
		}
		claimed.add(resolved.localName);
		repositories.push(resolved);
	}
	return { repositories, skipped };
};
