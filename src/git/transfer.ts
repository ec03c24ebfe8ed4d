import { type CommandResult, runCommand } from "../exec";
import { buildGitEnv, resolveGitCommand } from "./git-env";

export type TransferOptions = {
	timeoutMs?: number;
	logger?: (message: string) => void;
	progressLogger?: (message: string) => void;
};

export type TransferResult = CommandResult;

const git = (args: string[], options: TransferOptions = {}) =>
	runCommand(resolveGitCommand(), args, {
		env: buildGitEnv(),
		timeoutMs: options.timeoutMs,
		logger: options.logger,
		progressLogger: options.progressLogger,
	});

export const cloneRepository = (
	remoteUrl: string,
	localPath: string,
	options?: TransferOptions,
): Promise<TransferResult> =>
	git(
		options?.progressLogger
			? ["clone", "--progress", remoteUrl, localPath]
			: ["clone", remoteUrl, localPath],
		options,
	);

export const pullRepository = (
	localPath: string,
	options?: TransferOptions,
): Promise<TransferResult> =>
	git(
		options?.progressLogger
			? ["-C", localPath, "pull", "--progress"]
			: ["-C", localPath, "pull"],
		options,
	);
