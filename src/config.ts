import * as z from "zod";

import { ConfigError } from "./errors";
import { MAX_LISTING_LIMIT } from "./github/list-repos";
import { DEFAULT_DESTINATION, resolveDestination } from "./paths";
import type { BackupOptions } from "./types/backup";

export const DESTINATION_ENV = "REPO_BACKUP_DEST";

export const BackupOptionsSchema = z
	.object({
		destination: z.string().trim().min(1, "destination must not be empty"),
		owner: z.string().trim().min(1).optional(),
		limit: z.number().int().min(1).max(MAX_LISTING_LIMIT),
		timeoutMs: z.number().int().positive().optional(),
		verbose: z.boolean(),
	})
	.strict();

export type BackupOptionsInput = {
	destination?: string;
	owner?: string;
	limit?: number;
	timeoutMs?: number;
	verbose?: boolean;
};

/**
 * Merge explicit options with the environment and validate the result.
 * The destination is returned as an absolute path.
 */
export const loadBackupOptions = (
	input: BackupOptionsInput = {},
	env: NodeJS.ProcessEnv = process.env,
	cwd = process.cwd(),
): BackupOptions => {
	const parsed = BackupOptionsSchema.safeParse({
		destination:
			input.destination ?? env[DESTINATION_ENV] ?? DEFAULT_DESTINATION,
		...(input.owner !== undefined ? { owner: input.owner } : {}),
		limit: input.limit ?? MAX_LISTING_LIMIT,
		...(input.timeoutMs !== undefined ? { timeoutMs: input.timeoutMs } : {}),
		verbose: input.verbose ?? false,
	});
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map((issue) =>
				issue.path.length > 0
					? `${issue.path.join(".")}: ${issue.message}`
					: issue.message,
			),
		);
	}
	return {
		...parsed.data,
		destination: resolveDestination(parsed.data.destination, cwd),
	};
};
