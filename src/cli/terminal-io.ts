export class TerminalIO {
	stdoutWrite(text: string): void {
		process.stdout.write(text);
	}

	stderrWrite(text: string): void {
		process.stderr.write(text);
	}

	get isStdinTTY(): boolean {
		return process.stdin.isTTY === true;
	}

	get isStderrTTY(): boolean {
		return process.stderr.isTTY === true;
	}

	/** Read stdin to the end. */
	async readStdin(): Promise<string> {
		const chunks: Buffer[] = [];
		const stdin: AsyncIterable<unknown> = process.stdin;
		for await (const chunk of stdin) {
			chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
		}
		return Buffer.concat(chunks).toString("utf-8");
	}

	restoreTerminal(): void {
		try {
			if (this.isStderrTTY) this.stderrWrite("\x1B[?25h\r\x1B[2K");
		} catch {
			/* stderr already closed */
		}
	}

	registerCleanup(): void {
		const cleanup = () => this.restoreTerminal();
		process.on("exit", cleanup);
		process.on("SIGTERM", () => {
			cleanup();
			process.exit(143);
		});
		process.on("SIGINT", () => {
			cleanup();
			process.exit(130);
		});
	}
}

export const terminal = new TerminalIO();
