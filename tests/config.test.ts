import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadBackupOptions } from "../src/config";
import { ConfigError } from "../src/errors";

const cwd = path.resolve("/work");

describe("loadBackupOptions", () => {
	it("falls back to the default destination and limit", () => {
		expect(loadBackupOptions({}, {}, cwd)).toEqual({
			destination: path.join(cwd, "GitHub_Backups"),
			limit: 1000,
			verbose: false,
		});
	});

	it("prefers the explicit destination over the environment", () => {
		const options = loadBackupOptions(
			{ destination: "mine" },
			{ REPO_BACKUP_DEST: "theirs" },
			cwd,
		);
		expect(options.destination).toBe(path.join(cwd, "mine"));
	});

	it("uses the environment destination when none is given", () => {
		const options = loadBackupOptions({}, { REPO_BACKUP_DEST: "theirs" }, cwd);
		expect(options.destination).toBe(path.join(cwd, "theirs"));
	});

	it("keeps owner and timeout", () => {
		const options = loadBackupOptions(
			{ owner: "acme", timeoutMs: 5000, limit: 20, verbose: true },
			{},
			cwd,
		);
		expect(options).toEqual({
			destination: path.join(cwd, "GitHub_Backups"),
			owner: "acme",
			limit: 20,
			timeoutMs: 5000,
			verbose: true,
		});
	});

	it("rejects a limit above what gh returns", () => {
		expect(() => loadBackupOptions({ limit: 1001 }, {}, cwd)).toThrow(
			ConfigError,
		);
	});

	it("rejects a blank destination", () => {
		try {
			loadBackupOptions({ destination: "   " }, {}, cwd);
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigError);
			expect(error).toHaveProperty("issues", [
				"destination: destination must not be empty",
			]);
		}
	});
});
