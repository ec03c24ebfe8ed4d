export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	error instanceof Error &&
	"code" in error &&
	(typeof error.code === "string" ||
		typeof error.code === "number" ||
		error.code === undefined);

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export const getErrorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

export class ConfigError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid options: ${issues.join("; ")}`);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

/**
 * Raised when a host is asked to start a run while another one is still active.
 */
export class BackupInProgressError extends Error {
	constructor(destination: string) {
		super(`A backup into ${destination} is already running.`);
		this.name = "BackupInProgressError";
	}
}
