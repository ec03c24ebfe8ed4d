export type RepositoryDescriptor = {
	readonly remoteUrl: string;
};

export type ResolvedRepository = {
	remoteUrl: string;
	localName: string;
	localPath: string;
};

export type SkippedRepository = {
	remoteUrl: string;
	localName: string;
	reason: "empty-name" | "duplicate-name";
};

export type LogSink = (message: string) => void;
export type ProgressSink = (percent: number) => void;

export type BackupSinks = {
	log: LogSink;
	progress: ProgressSink;
	/** Raw output lines of the external commands, only wired in verbose mode. */
	detail?: LogSink;
};

export type BackupOptions = {
	destination: string;
	owner?: string;
	limit: number;
	timeoutMs?: number;
	verbose: boolean;
};

export type BackupAction = "clone" | "update";

export type BackupResult = {
	name: string;
	remoteUrl: string;
	localPath: string;
	status: "cloned" | "updated" | "failed" | "skipped";
	action?: BackupAction;
	error?: string;
};

export type BackupStatus = "completed" | "empty" | "failed";

export type BackupSummary = {
	destination: string;
	status: BackupStatus;
	results: BackupResult[];
	error?: string;
};

export type BackupPlanEntry = ResolvedRepository & {
	action: BackupAction;
};

export type BackupPlan = {
	destination: string;
	entries: BackupPlanEntry[];
	skipped: SkippedRepository[];
};

export type BackupEvent =
	| { type: "log"; message: string }
	| { type: "progress"; percent: number }
	| { type: "detail"; message: string }
	| { type: "complete"; summary: BackupSummary };
