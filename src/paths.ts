import path from "node:path";

export const DEFAULT_DESTINATION = "GitHub_Backups";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

export const resolveDestination = (destination: string, cwd = process.cwd()) =>
	path.resolve(cwd, destination);

export const displayPath = (value: string, cwd = process.cwd()) => {
	const rel = path.relative(cwd, value);
	const selected = rel.length > 0 && rel.length < value.length ? rel : value;
	return toPosixPath(selected);
};
