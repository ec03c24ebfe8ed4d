export type CliOptions = {
	dest?: string;
	owner?: string;
	limit?: number;
	timeoutMs?: number;
	dryRun: boolean;
	json: boolean;
	silent: boolean;
	verbose: boolean;
};
