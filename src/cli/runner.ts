import { readFile } from "node:fs/promises";
import type { ChatStreamer } from "../llm-api/chat.ts";
import { autoDiscoverModel } from "../llm-api/providers.ts";
import type { CompletionSettings } from "../llm-api/types.ts";
import {
	type TemplateFrontmatter,
	renderPromptTemplate,
} from "../template/render.ts";
import type { CliArgs } from "./args.ts";
import { replaceFile } from "./backup.ts";
import { copyToClipboard } from "./clipboard.ts";
import { G, Spinner, notice, renderUsage, write, writeln } from "./output.ts";
import { type TerminalIO, terminal } from "./terminal-io.ts";

export interface RunnerDeps {
	chat: ChatStreamer;
	io?: TerminalIO;
	copy?: (text: string) => Promise<void>;
	now?: () => Date;
	defaultModel?: () => string;
}

export interface RenderedPrompt {
	prompt: string;
	frontmatter: TemplateFrontmatter;
}

export class Runner {
	private readonly io: TerminalIO;
	private readonly chat: ChatStreamer;
	private readonly copy: (text: string) => Promise<void>;
	private readonly now: () => Date;
	private readonly defaultModel: () => string;

	constructor(
		private readonly args: CliArgs,
		deps: RunnerDeps,
	) {
		this.chat = deps.chat;
		this.io = deps.io ?? terminal;
		this.copy = deps.copy ?? ((text) => copyToClipboard(text));
		this.now = deps.now ?? (() => new Date());
		this.defaultModel = deps.defaultModel ?? autoDiscoverModel;
	}

	private async readInput(): Promise<string> {
		if (this.args.noInput) return "";
		if (this.args.inputFile) return readFile(this.args.inputFile, "utf-8");
		if (this.io.isStdinTTY) {
			notice(
				`${G.info} reading input from the terminal, end it with Ctrl-D (or pass -n)`,
				this.io,
			);
		}
		return this.io.readStdin();
	}

	async renderPrompt(): Promise<RenderedPrompt> {
		const template = await readFile(this.args.promptFile, "utf-8");
		const input = await this.readInput();
		return renderPromptTemplate(template, { Input: input });
	}

	/** Flag beats frontmatter; the environment decides when neither names one. */
	modelFor(frontmatter: TemplateFrontmatter): string {
		return this.args.model ?? frontmatter.model ?? this.defaultModel();
	}

	outputStream(
		prompt: string,
		frontmatter: TemplateFrontmatter,
	): AsyncIterable<string> {
		const settings: CompletionSettings = { model: this.modelFor(frontmatter) };
		if (frontmatter.temperature !== undefined) {
			settings.temperature = frontmatter.temperature;
		}
		if (frontmatter.maxTokens !== undefined) {
			settings.maxOutputTokens = frontmatter.maxTokens;
		}
		return this.chat.stream(prompt, settings);
	}

	/** The file the answer replaces, or null for stdout. */
	outputFile(): string | null {
		let out = this.args.outputFile;
		if (this.args.replaceInputFile && !out) out = this.args.inputFile;
		if (!out || out === "-") return null;
		return out;
	}

	async run(): Promise<void> {
		const { prompt, frontmatter } = await this.renderPrompt();

		if (this.args.printPrompt) {
			writeln(prompt, this.io);
			await this.copy(prompt);
			writeln("[copied to clipboard]", this.io);
			return;
		}

		const model = this.modelFor(frontmatter);
		const spinner = new Spinner(this.io);
		spinner.start(model);
		const chunks = stopOnFirst(this.outputStream(prompt, frontmatter), () =>
			spinner.stop(),
		);

		try {
			const target = this.outputFile();
			if (target === null) {
				for await (const chunk of chunks) {
					write(chunk, this.io);
				}
			} else {
				const backupPath = await replaceFile(
					chunks,
					target,
					(chunk) => write(chunk, this.io),
					this.now(),
				);
				notice(`${G.ok} wrote ${target} (backup: ${backupPath})`, this.io);
			}
		} finally {
			spinner.stop();
		}

		if (this.io.isStderrTTY && this.chat.lastUsage) {
			renderUsage(model, this.chat.lastUsage, this.io);
		}
	}
}

async function* stopOnFirst(
	chunks: AsyncIterable<string>,
	onFirst: () => void,
): AsyncGenerator<string> {
	let first = true;
	for await (const chunk of chunks) {
		if (first) {
			onFirst();
			first = false;
		}
		yield chunk;
	}
}
