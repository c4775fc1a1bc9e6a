import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import type { FrontmatterDecoder } from "./frontmatter.ts";

/**
 * YAML frontmatter decoder validated by a zod schema. Unknown keys are
 * dropped by the schema; an empty block decodes as `{}`.
 */
export function createYamlDecoder<T>(
	schema: z.ZodType<T>,
): FrontmatterDecoder<T> {
	return {
		decode(block: string): T {
			const doc: unknown = parseYaml(block) ?? {};
			if (typeof doc !== "object" || Array.isArray(doc)) {
				throw new Error("frontmatter must be a mapping of keys to values");
			}
			return schema.parse(doc);
		},
	};
}
