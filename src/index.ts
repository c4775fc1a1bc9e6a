#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { parseArgs, printHelp, printVersion } from "./cli/args.ts";
import { initErrorLog } from "./cli/error-log.ts";
import { renderError } from "./cli/output.ts";
import { Runner } from "./cli/runner.ts";
import { terminal } from "./cli/terminal-io.ts";
import { Chat } from "./llm-api/chat.ts";

// Register terminal cleanup as early as possible so the cursor is restored
// even if the spinner is running when the process is interrupted.
terminal.registerCleanup();

async function main(): Promise<void> {
	initErrorLog();

	const args = parseArgs(process.argv.slice(2));
	if (args.action === "help") {
		printHelp();
		return;
	}
	if (args.action === "version") {
		printVersion();
		return;
	}

	const contextMessages = await Promise.all(
		args.contextFiles.map((file) => readFile(file, "utf-8")),
	);
	const chat = new Chat({ contextMessages });

	await new Runner(args, { chat }).run();
}

main().catch((err: unknown) => {
	renderError(err, "main");
	process.exit(1);
});
