export {
	type BackupDeps,
	countResults,
	planBackup,
	runBackup,
} from "./backup";
export { EventChannel } from "./channel";
export {
	type BackupOptionsInput,
	BackupOptionsSchema,
	loadBackupOptions,
} from "./config";
export { BackupInProgressError, ConfigError } from "./errors";
export type { CommandResult } from "./exec";
export {
	cloneRepository,
	pullRepository,
	type TransferOptions,
	type TransferResult,
} from "./git/transfer";
export {
	decodeListing,
	listRepositories,
	MAX_LISTING_LIMIT,
} from "./github/list-repos";
export { BackupHost, type BackupHostOptions } from "./host";
export {
	COMPLETE,
	LISTING_DONE,
	LISTING_START,
	percentFor,
	ProgressTracker,
} from "./progress";
export {
	resolveLocalName,
	resolveRepositories,
	resolveRepository,
} from "./resolve-repo";
export type * from "./types/backup";
