import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { backupFile, formatTimestamp, replaceFile } from "./backup.ts";

const AT = new Date(Date.UTC(2024, 2, 9, 14, 5, 0));

async function* chunksOf(parts: string[]): AsyncGenerator<string> {
	for (const p of parts) yield p;
}

describe("formatTimestamp", () => {
	test("UTC uses Z", () => {
		expect(formatTimestamp(AT, 0)).toBe("2024-03-09T14:05:00Z");
	});

	test("positive offset", () => {
		expect(formatTimestamp(AT, 60)).toBe("2024-03-09T15:05:00+01:00");
	});

	test("negative half-hour offset", () => {
		expect(formatTimestamp(AT, -330)).toBe("2024-03-09T08:35:00-05:30");
	});

	test("offset can cross midnight", () => {
		const late = new Date(Date.UTC(2023, 11, 31, 23, 30, 15));
		expect(formatTimestamp(late, 120)).toBe("2024-01-01T01:30:15+02:00");
	});
});

describe("backupFile / replaceFile", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "pp-backup-test-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	test("backupFile copies next to the original", async () => {
		const file = join(dir, "notes.txt");
		writeFileSync(file, "original");

		const backup = await backupFile(file, AT);
		expect(backup).toBe(`${file}.${formatTimestamp(AT)}`);
		expect(readFileSync(backup, "utf-8")).toBe("original");
		expect(readFileSync(file, "utf-8")).toBe("original");
	});

	test("replaceFile overwrites and tees every chunk", async () => {
		const file = join(dir, "draft.md");
		writeFileSync(file, "old content that is longer than the new one");

		const teed: string[] = [];
		const backup = await replaceFile(
			chunksOf(["new ", "text", "\n"]),
			file,
			(chunk) => teed.push(chunk),
			AT,
		);

		expect(readFileSync(file, "utf-8")).toBe("new text\n");
		expect(readFileSync(backup, "utf-8")).toBe(
			"old content that is longer than the new one",
		);
		expect(teed).toEqual(["new ", "text", "\n"]);
	});

	test("replaceFile needs an existing file", async () => {
		const file = join(dir, "missing.md");
		await expect(
			replaceFile(chunksOf(["x"]), file, () => {}, AT),
		).rejects.toMatchObject({ code: "ENOENT" });
	});
});
