import { access, mkdir } from "node:fs/promises";

export const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

export const ensureDirectory = async (target: string) => {
	await mkdir(target, { recursive: true });
};
