import {
	APICallError,
	LoadAPIKeyError,
	NoContentGeneratedError,
	NoSuchModelError,
	RetryError,
} from "ai";
import {
	ClosingDelimiterNotFoundError,
	FrontmatterDecodeError,
	MismatchedDelimiterError,
} from "../template/frontmatter.ts";
import { TemplateError } from "../template/render.ts";
import { UsageError } from "./args.ts";

export function parseAppError(err: unknown): {
	headline: string;
	hint?: string;
} {
	if (typeof err === "string") {
		return { headline: err };
	}

	if (err instanceof UsageError) {
		return { headline: err.message, hint: "Run with --help for usage" };
	}

	if (err instanceof ClosingDelimiterNotFoundError) {
		return {
			headline: "Unterminated frontmatter",
			hint: `Add a closing ${err.delimiter} line after the metadata block`,
		};
	}

	if (err instanceof MismatchedDelimiterError) {
		return {
			headline: "Mismatched frontmatter delimiter",
			hint: `Opened with ${err.expected} but line ${err.line} closes with ${err.found}`,
		};
	}

	if (err instanceof FrontmatterDecodeError) {
		const inner = err.cause instanceof Error ? err.cause.message : err.message;
		return {
			headline: "Invalid frontmatter",
			hint: inner.split("\n")[0]?.trim() || inner,
		};
	}

	if (err instanceof TemplateError) {
		return { headline: `Template error: ${err.message}` };
	}

	if (err instanceof RetryError) {
		const inner = parseAppError(err.lastError);
		return {
			headline: `Retries exhausted: ${inner.headline}`,
			...(inner.hint ? { hint: inner.hint } : {}),
		};
	}

	if (err instanceof APICallError) {
		if (err.statusCode === 429) {
			return {
				headline: "Rate limit hit",
				hint: "Wait a moment and retry, or pick another model with -m",
			};
		}
		if (err.statusCode === 401 || err.statusCode === 403) {
			return {
				headline: "Auth failed",
				hint: "Check the relevant provider API key env var",
			};
		}
		return {
			headline: `API error ${err.statusCode ?? "unknown"}`,
			...(err.url ? { hint: err.url } : {}),
		};
	}

	if (err instanceof NoContentGeneratedError) {
		return {
			headline: "Model returned empty response",
			hint: "Try rephrasing the template or pick another model with -m",
		};
	}

	if (err instanceof LoadAPIKeyError) {
		return {
			headline: "API key not found",
			hint: "Set the relevant provider env var",
		};
	}

	if (err instanceof NoSuchModelError) {
		return {
			headline: "Model not found",
			hint: "Pass a valid <provider>/<model-id> with -m",
		};
	}

	const isObj = typeof err === "object" && err !== null;
	const code = isObj && "code" in err ? String(err.code) : undefined;
	const message = isObj && "message" in err ? String(err.message) : String(err);

	if (code === "ENOENT") {
		const path = isObj && "path" in err ? String(err.path) : undefined;
		return {
			headline: "File not found",
			...(path ? { hint: path } : {}),
		};
	}

	if (code === "ECONNREFUSED" || message.includes("ECONNREFUSED")) {
		return {
			headline: "Connection failed",
			hint: "Check network or local server",
		};
	}

	const firstLine = message.split("\n")[0]?.trim() || "Unknown error";
	return { headline: firstLine };
}
