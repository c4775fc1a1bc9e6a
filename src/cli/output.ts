import * as c from "yoctocolors";
import { logError } from "./error-log.ts";
import { parseAppError } from "./error-parse.ts";
import { type TerminalIO, terminal } from "./terminal-io.ts";

declare const __PACKAGE_VERSION__: string;
export const PACKAGE_VERSION =
	typeof __PACKAGE_VERSION__ !== "undefined" ? __PACKAGE_VERSION__ : "unknown";

// stdout carries the prompt or the model's answer; everything else goes to stderr.

// ─── Primitives ───────────────────────────────────────────────────────────────

export function writeln(text = "", io: TerminalIO = terminal): void {
	io.stdoutWrite(`${text}\n`);
}

export function write(text: string, io: TerminalIO = terminal): void {
	io.stdoutWrite(text);
}

export function notice(text: string, io: TerminalIO = terminal): void {
	io.stderrWrite(`${text}\n`);
}

// ─── Glyph vocabulary ─────────────────────────────────────────────────────────

export const G = {
	ok: c.green("✔"),
	err: c.red("✖"),
	info: c.dim("·"),
};

// ─── Spinner ──────────────────────────────────────────────────────────────────

const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export class Spinner {
	private frame = 0;
	private timer: ReturnType<typeof setInterval> | null = null;
	private label = "";

	constructor(private readonly io: TerminalIO = terminal) {}

	start(label = ""): void {
		this.label = label;
		if (this.timer || !this.io.isStderrTTY) return;
		this.io.stderrWrite("\x1B[?25l");
		this._tick();
		this.timer = setInterval(() => this._tick(), 80);
	}

	stop(): void {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
		this.io.stderrWrite("\r\x1B[2K\x1B[?25h");
	}

	private _tick(): void {
		const f = FRAMES[this.frame++ % FRAMES.length] ?? "⠋";
		const label = this.label ? c.dim(` ${this.label}`) : "";
		this.io.stderrWrite(`\r${c.dim(f)}${label}`);
	}
}

// ─── Error / info helpers ─────────────────────────────────────────────────────

export function renderError(
	err: unknown,
	context = "render",
	io: TerminalIO = terminal,
): void {
	logError(err, context);
	const parsed = parseAppError(err);
	notice(`${G.err} ${c.red(parsed.headline)}`, io);
	if (parsed.hint) {
		notice(`  ${c.dim(parsed.hint)}`, io);
	}
}

export function renderInfo(msg: string, io: TerminalIO = terminal): void {
	notice(`${G.info} ${c.dim(msg)}`, io);
}

export function renderUsage(
	model: string,
	usage: { inputTokens: number; outputTokens: number },
	io: TerminalIO = terminal,
): void {
	renderInfo(
		`${model}  ↑${fmtTokens(usage.inputTokens)} ↓${fmtTokens(usage.outputTokens)}`,
		io,
	);
}

export function fmtTokens(n: number): string {
	if (n >= 1000) return `${(n / 1000).toFixed(1)}k`;
	return String(n);
}
