import { describe, expect, test } from "vitest";
import { FrontmatterDecodeError } from "./frontmatter.ts";
import {
	TemplateError,
	renderPromptTemplate,
	renderTemplate,
} from "./render.ts";

// ─── renderTemplate ───────────────────────────────────────────────────────────

describe("renderTemplate", () => {
	test("replaces {{.Input}}", () => {
		expect(renderTemplate("Hi {{.Input}}!", { Input: "there" })).toBe(
			"Hi there!",
		);
	});

	test("allows spaces inside the braces", () => {
		expect(renderTemplate("[{{ .Input }}]", { Input: "x" })).toBe("[x]");
	});

	test("replaces every occurrence", () => {
		expect(renderTemplate("{{.Input}}-{{.Input}}", { Input: "a" })).toBe("a-a");
	});

	test("no actions returns the template unchanged", () => {
		expect(renderTemplate("plain text", { Input: "ignored" })).toBe(
			"plain text",
		);
	});

	test("substituted values are not expanded again", () => {
		expect(renderTemplate("{{.Input}}", { Input: "{{.Other}}" })).toBe(
			"{{.Other}}",
		);
	});

	test("unknown field fails", () => {
		expect(() => renderTemplate("{{.Missing}}", { Input: "" })).toThrow(
			new TemplateError("line 1: can't evaluate field Missing"),
		);
	});

	test("inherited object properties are not fields", () => {
		expect(() => renderTemplate("{{.toString}}", {})).toThrow(
			"can't evaluate field toString",
		);
	});

	test("control actions are unsupported", () => {
		expect(() =>
			renderTemplate("{{if .Input}}x{{end}}", { Input: "y" }),
		).toThrow("line 1: unsupported action {{if .Input}}");
	});

	test("unclosed action reports its line", () => {
		expect(() => renderTemplate("a\nb {{.Input", { Input: "" })).toThrow(
			"line 2: unclosed action",
		);
	});
});

// ─── renderPromptTemplate ─────────────────────────────────────────────────────

describe("renderPromptTemplate", () => {
	test("decodes frontmatter and renders the body", () => {
		const raw =
			"---\ntemperature: 0.3\nmodel: openai/gpt-4o-mini\n---\nFix this:\n{{.Input}}";
		expect(renderPromptTemplate(raw, { Input: "teh cat" })).toEqual({
			prompt: "Fix this:\nteh cat\n",
			frontmatter: { temperature: 0.3, model: "openai/gpt-4o-mini" },
		});
	});

	test("template without frontmatter gets empty settings", () => {
		expect(renderPromptTemplate("{{.Input}}", { Input: "x" })).toEqual({
			prompt: "x\n",
			frontmatter: {},
		});
	});

	test("maxTokens is read as an integer", () => {
		const raw = "---\nmaxTokens: 800\n---\nbody";
		expect(renderPromptTemplate(raw, {}).frontmatter).toEqual({
			maxTokens: 800,
		});
	});

	test("non-numeric temperature is rejected", () => {
		expect(() =>
			renderPromptTemplate("---\ntemperature: hot\n---\nbody", {}),
		).toThrow(FrontmatterDecodeError);
	});

	test("temperature above 2 is rejected", () => {
		expect(() =>
			renderPromptTemplate("---\ntemperature: 3\n---\nbody", {}),
		).toThrow(FrontmatterDecodeError);
	});

	test("fractional maxTokens is rejected", () => {
		expect(() =>
			renderPromptTemplate("---\nmaxTokens: 1.5\n---\nbody", {}),
		).toThrow(FrontmatterDecodeError);
	});
});
