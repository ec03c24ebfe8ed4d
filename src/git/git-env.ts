const resolveGitCommand = (): string => {
	// Allow tests and unusual installs to override the git binary
	const override = process.env.REPO_BACKUP_GIT_COMMAND;
	if (override) {
		return override;
	}
	return "git";
};

const resolveGhCommand = (): string => {
	const override = process.env.REPO_BACKUP_GH_COMMAND;
	if (override) {
		return override;
	}
	return "gh";
};

// Credentials stay with git's own config (gh installs itself as the
// credential helper there), so only interactive prompts are disabled.
const buildGitEnv = (): NodeJS.ProcessEnv => {
	const pathValue = process.env.PATH ?? process.env.Path;
	const pathExtValue =
		process.env.PATHEXT ??
		(process.platform === "win32" ? ".COM;.EXE;.BAT;.CMD" : undefined);
	return {
		...process.env,
		...(pathValue ? { PATH: pathValue, Path: pathValue } : {}),
		...(pathExtValue ? { PATHEXT: pathExtValue } : {}),
		GIT_TERMINAL_PROMPT: "0",
		GH_PROMPT_DISABLED: "1",
		GH_NO_UPDATE_NOTIFIER: "1",
	};
};

export { buildGitEnv, resolveGhCommand, resolveGitCommand };
