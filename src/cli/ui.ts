import pc from "picocolors";
import { displayPath } from "../paths";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
};

let _silentMode = false;

export const setSilentMode = (silent: boolean) => {
	_silentMode = silent;
};

export const isSilentMode = () => _silentMode;

export const ui = {
	// Formatters
	path: (value: string) => displayPath(value),
	percent: (value: number) => `${String(value).padStart(3)}%`,

	// Components
	line: (text: string = "") => {
		if (_silentMode) return;
		process.stdout.write(`${text}\n`);
	},

	item: (icon: string, label: string, details?: string) => {
		if (_silentMode) return;
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		process.stdout.write(`  ${icon} ${partLabel} ${partDetails}\n`);
	},
};
