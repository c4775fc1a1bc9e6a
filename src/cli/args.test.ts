import { describe, expect, test } from "vitest";
import { UsageError, parseArgs } from "./args.ts";

describe("parseArgs", () => {
	test("prompt file only", () => {
		expect(parseArgs(["fix.md"])).toEqual({
			action: "run",
			promptFile: "fix.md",
			inputFile: null,
			outputFile: null,
			printPrompt: false,
			replaceInputFile: false,
			noInput: false,
			model: null,
			contextFiles: [],
		});
	});

	test("positionals and flags in any order", () => {
		expect(
			parseArgs(["-p", "fix.md", "--model", "openai/gpt-4o", "in.txt", "-"]),
		).toMatchObject({
			promptFile: "fix.md",
			inputFile: "in.txt",
			outputFile: "-",
			printPrompt: true,
			model: "openai/gpt-4o",
		});
	});

	test("short flags", () => {
		expect(parseArgs(["-r", "-n", "-m", "ollama/llama3.2", "a.md", "b.txt"]))
			.toMatchObject({
				replaceInputFile: true,
				noInput: true,
				model: "ollama/llama3.2",
			});
	});

	test("context files accumulate", () => {
		expect(
			parseArgs(["-c", "one.md", "--context", "two.md", "p.md"]),
		).toMatchObject({ contextFiles: ["one.md", "two.md"] });
	});

	test("help and version short-circuit", () => {
		expect(parseArgs(["--help"])).toEqual({ action: "help" });
		expect(parseArgs(["-v", "whatever"])).toEqual({ action: "version" });
	});

	test("missing prompt file", () => {
		expect(() => parseArgs([])).toThrow(
			new UsageError("missing prompt template file"),
		);
	});

	test("unknown option", () => {
		expect(() => parseArgs(["--fast", "p.md"])).toThrow(
			"unknown option --fast",
		);
	});

	test("--model needs a value", () => {
		expect(() => parseArgs(["p.md", "-m"])).toThrow("-m requires a model id");
	});

	test("--replace needs an input file", () => {
		expect(() => parseArgs(["-r", "p.md"])).toThrow(
			"--replace needs an input file",
		);
	});

	test("too many positionals", () => {
		expect(() => parseArgs(["a", "b", "c", "d"])).toThrow(
			"unexpected argument d",
		);
	});
});
