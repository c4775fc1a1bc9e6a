import * as c from "yoctocolors";
import { availableProviders } from "../llm-api/providers.ts";
import { PACKAGE_VERSION, writeln } from "./output.ts";

export class UsageError extends Error {
	override name = "UsageError";
}

export interface CliArgs {
	/** Prompt template file (required) */
	promptFile: string;
	/** Input embedded as {{.Input}}; stdin when absent */
	inputFile: string | null;
	/** Where the answer goes; stdout when absent or "-" */
	outputFile: string | null;
	printPrompt: boolean;
	replaceInputFile: boolean;
	noInput: boolean;
	model: string | null;
	/** Files sent as user messages ahead of the prompt */
	contextFiles: string[];
}

export type ParsedArgs =
	| { action: "help" }
	| { action: "version" }
	| ({ action: "run" } & CliArgs);

export function parseArgs(argv: string[]): ParsedArgs {
	let printPrompt = false;
	let replaceInputFile = false;
	let noInput = false;
	let model: string | null = null;
	const contextFiles: string[] = [];
	const positional: string[] = [];

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		switch (arg) {
			case "--prompt":
			case "-p":
				printPrompt = true;
				break;
			case "--replace":
			case "-r":
				replaceInputFile = true;
				break;
			case "--no-input":
			case "-n":
				noInput = true;
				break;
			case "--model":
			case "-m": {
				const value = argv[++i];
				if (value === undefined) {
					throw new UsageError(`${arg} requires a model id`);
				}
				model = value;
				break;
			}
			case "--context":
			case "-c": {
				const value = argv[++i];
				if (value === undefined) {
					throw new UsageError(`${arg} requires a file`);
				}
				contextFiles.push(value);
				break;
			}
			case "--help":
			case "-h":
				return { action: "help" };
			case "--version":
			case "-v":
				return { action: "version" };
			case "-":
				positional.push(arg);
				break;
			default:
				if (arg.startsWith("-")) throw new UsageError(`unknown option ${arg}`);
				positional.push(arg);
		}
	}

	const [promptFile, inputFile, outputFile, ...extra] = positional;
	if (!promptFile) throw new UsageError("missing prompt template file");
	if (extra.length > 0) {
		throw new UsageError(`unexpected argument ${extra[0]}`);
	}
	if (replaceInputFile && !inputFile) {
		throw new UsageError("--replace needs an input file");
	}

	return {
		action: "run",
		promptFile,
		inputFile: inputFile ?? null,
		outputFile: outputFile ?? null,
		printPrompt,
		replaceInputFile,
		noInput,
		model,
		contextFiles,
	};
}

export function printVersion(): void {
	writeln(PACKAGE_VERSION);
}

export function printHelp(): void {
	writeln(
		`${c.bold("promptpipe")} · render a prompt template and stream the answer\n`,
	);
	writeln(
		`${c.bold("Usage:")}  promptpipe [options] <prompt-file> [input-file] [output-file]\n`,
	);
	writeln(`${c.bold("Options:")}`);
	const opts = [
		["-p, --prompt", "Print the rendered prompt and copy it to the clipboard"],
		["-r, --replace", "Write the answer over the input file (backup kept)"],
		["-n, --no-input", "Render the template with no input"],
		["-m, --model <id>", "Model to use (e.g. openai/gpt-4o-mini)"],
		["-c, --context <file>", "Send a file as context before the prompt"],
		["-v, --version", "Print the version"],
		["-h, --help", "Show this help"],
	];
	for (const [flag, desc] of opts) {
		writeln(`  ${c.cyan((flag ?? "").padEnd(22))} ${c.dim(desc ?? "")}`);
	}
	writeln(`\n${c.bold("Provider env vars:")}`);
	const envs = [
		["OPENAI_API_KEY", "OpenAI (OPENAI_SECRET also accepted)"],
		["ANTHROPIC_API_KEY", "Anthropic"],
		["GOOGLE_API_KEY", "Google Gemini"],
		["OLLAMA_BASE_URL", "Ollama base URL (default: http://localhost:11434)"],
	];
	for (const [env, desc] of envs) {
		writeln(`  ${c.yellow((env ?? "").padEnd(22))} ${c.dim(desc ?? "")}`);
	}
	writeln(`\n${c.dim(`configured: ${availableProviders().join(", ")}`)}`);
	writeln(`\n${c.bold("Template frontmatter:")}`);
	writeln(c.dim("  ---"));
	writeln(c.dim("  model: anthropic/claude-3-5-haiku-latest"));
	writeln(c.dim("  temperature: 0.2"));
	writeln(c.dim("  maxTokens: 800"));
	writeln(c.dim("  ---"));
	writeln(c.dim("  Summarise the following notes:"));
	writeln(c.dim("  {{.Input}}"));
	writeln(`\n${c.bold("Examples:")}`);
	writeln(
		`  promptpipe fix.md notes.txt        ${c.dim("# answer to stdout")}`,
	);
	writeln(
		`  promptpipe -r fix.md notes.txt     ${c.dim("# rewrite notes.txt in place")}`,
	);
	writeln(`  cat a.txt | promptpipe fix.md      ${c.dim("# input from stdin")}`);
	writeln(`  promptpipe -p fix.md notes.txt     ${c.dim("# copy the prompt")}`);
}
