import { constants } from "node:fs";
import { copyFile, open } from "node:fs/promises";

function pad(n: number, width = 2): string {
	return String(n).padStart(width, "0");
}

/**
 * RFC 3339 timestamp at second precision in the given UTC offset,
 * e.g. `2024-03-09T14:05:00+01:00`, or `...Z` at offset zero.
 */
export function formatTimestamp(
	date: Date,
	offsetMinutes = -date.getTimezoneOffset(),
): string {
	const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
	const stamp =
		`${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}` +
		`T${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`;
	if (offsetMinutes === 0) return `${stamp}Z`;

	const sign = offsetMinutes > 0 ? "+" : "-";
	const abs = Math.abs(offsetMinutes);
	return `${stamp}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/** Copy `filename` to `<filename>.<timestamp>` and return the copy's path. */
export async function backupFile(
	filename: string,
	now = new Date(),
): Promise<string> {
	const backupPath = `${filename}.${formatTimestamp(now)}`;
	await copyFile(filename, backupPath);
	return backupPath;
}

/**
 * Back up `filename`, then overwrite it with `chunks`, passing every chunk to
 * `tee` as it is written. The file must already exist.
 */
export async function replaceFile(
	chunks: AsyncIterable<string>,
	filename: string,
	tee: (chunk: string) => void,
	now = new Date(),
): Promise<string> {
	const backupPath = await backupFile(filename, now);

	const handle = await open(filename, constants.O_WRONLY | constants.O_TRUNC);
	try {
		for await (const chunk of chunks) {
			await handle.write(chunk);
			tee(chunk);
		}
	} finally {
		await handle.close();
	}
	return backupPath;
}
