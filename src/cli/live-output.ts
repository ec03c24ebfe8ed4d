import cliTruncate from "cli-truncate";
import { createLogUpdate } from "log-update";

type LiveOutputOptions = {
	stdout?: NodeJS.WriteStream;
	maxWidth?: number;
};

export type LiveOutput = {
	/** Write a line above the live region, which is redrawn on the next render. */
	print: (line: string) => void;
	render: (lines: string[]) => void;
	persist: (lines: string[]) => void;
	clear: () => void;
	stop: () => void;
};

export const createLiveOutput = (
	options: LiveOutputOptions = {},
): LiveOutput => {
	const stdout = options.stdout ?? process.stdout;
	const updater = createLogUpdate(stdout);
	const maxWidth = options.maxWidth ?? Math.max(20, (stdout.columns ?? 80) - 2);
	const format = (lines: string[]) =>
		lines
			.map((line) => cliTruncate(line, maxWidth, { position: "end" }))
			.join("\n");

	return {
		print: (line) => {
			updater.clear();
			stdout.write(`${line}\n`);
		},
		render: (lines) => {
			updater(format(lines));
		},
		persist: (lines) => {
			updater(format(lines));
			updater.done();
		},
		clear: () => {
			updater.clear();
		},
		stop: () => {
			updater.done();
		},
	};
};
