import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";

let fd: number | null = null;

export function errorLogPath(home = homedir()): string {
	return join(home, ".config", "promptpipe", "errors.log");
}

export function initErrorLog(logPath = errorLogPath()): void {
	if (fd !== null) return;

	mkdirSync(dirname(logPath), { recursive: true });

	// Truncate on open
	fd = openSync(logPath, "w");

	process.on("exit", closeErrorLog);
}

export function closeErrorLog(): void {
	if (fd === null) return;
	closeSync(fd);
	fd = null;
}

function isObject(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null;
}

export function formatErrorEntry(
	err: unknown,
	context?: string,
	now = new Date(),
): string {
	let entry = `[${now.toISOString()}]`;
	if (context) entry += ` context=${context}`;
	entry += "\n";

	if (isObject(err)) {
		if (typeof err.name === "string") entry += `  name: ${err.name}\n`;
		if (typeof err.message === "string") entry += `  message: ${err.message}\n`;
		if ("statusCode" in err) entry += `  statusCode: ${err.statusCode}\n`;
		if ("url" in err) entry += `  url: ${err.url}\n`;
		if ("isRetryable" in err) entry += `  isRetryable: ${err.isRetryable}\n`;
		if (isObject(err.cause) && typeof err.cause.message === "string") {
			entry += `  cause: ${err.cause.message}\n`;
		}
		if (typeof err.stack === "string") {
			const indentedStack = err.stack
				.split("\n")
				.map((line, i) => (i === 0 ? line : `  ${line}`))
				.join("\n");
			entry += `  stack: ${indentedStack}\n`;
		}
	} else {
		entry += `  value: ${String(err)}\n`;
	}

	return `${entry}---\n`;
}

export function logError(err: unknown, context?: string): void {
	if (fd === null) return;
	writeSync(fd, formatErrorEntry(err, context));
}
