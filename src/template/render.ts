import { z } from "zod";
import { createYamlDecoder } from "./decoder.ts";
import { parseFrontmatter } from "./frontmatter.ts";

// ─── Frontmatter schema ───────────────────────────────────────────────────────

export const templateFrontmatterSchema = z.object({
	temperature: z.number().min(0).max(2).optional(),
	/** "<provider>/<model-id>", overridden by --model */
	model: z.string().min(1).optional(),
	maxTokens: z.number().int().positive().optional(),
});

export type TemplateFrontmatter = z.infer<typeof templateFrontmatterSchema>;

const frontmatterDecoder = createYamlDecoder(templateFrontmatterSchema);

// ─── Rendering ────────────────────────────────────────────────────────────────

export class TemplateError extends Error {
	override name = "TemplateError";
}

const ACTION_RE = /\{\{([\s\S]*?)\}\}/g;
const FIELD_RE = /^\s*\.([A-Za-z_][A-Za-z0-9_]*)\s*$/;

/** 1-based line of `offset` within `text`, for error messages. */
function lineAt(text: string, offset: number): number {
	return text.slice(0, offset).split("\n").length;
}

/**
 * Substitute `{{.Field}}` actions with values from `data`.
 * Only plain field references are supported.
 */
export function renderTemplate(
	template: string,
	data: Record<string, string>,
): string {
	let out = "";
	let last = 0;

	for (const match of template.matchAll(ACTION_RE)) {
		const start = match.index ?? 0;
		const inner = match[1] ?? "";
		out += template.slice(last, start);

		const field = FIELD_RE.exec(inner)?.[1];
		if (field === undefined) {
			throw new TemplateError(
				`line ${lineAt(template, start)}: unsupported action {{${inner}}}`,
			);
		}
		const value = Object.hasOwn(data, field) ? data[field] : undefined;
		if (value === undefined) {
			throw new TemplateError(
				`line ${lineAt(template, start)}: can't evaluate field ${field}`,
			);
		}
		out += value;
		last = start + match[0].length;
	}

	const rest = template.slice(last);
	const unclosed = rest.indexOf("{{");
	if (unclosed !== -1) {
		throw new TemplateError(
			`line ${lineAt(template, last + unclosed)}: unclosed action`,
		);
	}
	return out + rest;
}

/** Strip and decode the template's frontmatter, then render its body. */
export function renderPromptTemplate(
	raw: string,
	data: Record<string, string>,
): { prompt: string; frontmatter: TemplateFrontmatter } {
	const { meta, body } = parseFrontmatter(raw, frontmatterDecoder);
	return {
		prompt: renderTemplate(body, data),
		frontmatter: meta ?? {},
	};
}
