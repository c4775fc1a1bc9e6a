// ─── Delimiters ───────────────────────────────────────────────────────────────

export const FRONTMATTER_DELIMITERS = ["---", "+++"] as const;

export type FrontmatterDelimiter = (typeof FRONTMATTER_DELIMITERS)[number];

function asDelimiter(trimmed: string): FrontmatterDelimiter | null {
	for (const d of FRONTMATTER_DELIMITERS) {
		if (trimmed === d) return d;
	}
	return null;
}

// Unicode White_Space. Unlike String#trim this keeps U+FEFF (a byte order
// mark is content) and strips U+0085.
const EDGE_SPACE_RE =
	/^[\t\n\v\f\r \u0085\u00A0\u1680\u2000-\u200A\u2028\u2029\u202F\u205F\u3000]+|[\t\n\v\f\r \u0085\u00A0\u1680\u2000-\u200A\u2028\u2029\u202F\u205F\u3000]+$/g;

export function trimSpace(s: string): string {
	return s.replace(EDGE_SPACE_RE, "");
}

// ─── Errors ───────────────────────────────────────────────────────────────────

export class FrontmatterError extends Error {
	override name = "FrontmatterError";
}

export class ClosingDelimiterNotFoundError extends FrontmatterError {
	override name = "ClosingDelimiterNotFoundError";

	constructor(readonly delimiter: FrontmatterDelimiter) {
		super(`closing delimiter ${delimiter} not found`);
	}
}

export class MismatchedDelimiterError extends FrontmatterError {
	override name = "MismatchedDelimiterError";

	constructor(
		readonly expected: FrontmatterDelimiter,
		readonly found: FrontmatterDelimiter,
		/** 1-based line number of the offending delimiter */
		readonly line: number,
	) {
		super(
			`different closing delimiter found: expected ${expected}, got ${found} on line ${line}`,
		);
	}
}

export class FrontmatterDecodeError extends FrontmatterError {
	override name = "FrontmatterDecodeError";

	constructor(cause: unknown) {
		const detail = cause instanceof Error ? cause.message : String(cause);
		super(`invalid frontmatter: ${detail}`, { cause });
	}
}

// ─── Decoder capability ───────────────────────────────────────────────────────

/** Turns a captured metadata block into a typed value, throwing if it is malformed. */
export interface FrontmatterDecoder<T> {
	decode(block: string): T;
}

export interface ParsedFrontmatter<T> {
	/** Undefined when the document carries no frontmatter block */
	meta: T | undefined;
	body: string;
}

// ─── Line reader ──────────────────────────────────────────────────────────────

/**
 * Split text into lines: `\n` terminates a line, a trailing `\r` is dropped,
 * and a final unterminated line is kept only when it has content.
 */
export function splitLines(text: string): string[] {
	if (text === "") return [];
	const lines = text.split("\n");
	if (lines[lines.length - 1] === "") lines.pop();
	return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

// ─── Scanner ──────────────────────────────────────────────────────────────────

type ScanState = "searching" | "frontmatter" | "body";

/**
 * One-shot line scanner. Feed every line with `push`, then call `finish`.
 *
 * searching → frontmatter   opening delimiter
 * searching → body          first non-blank, non-delimiter line
 * frontmatter → body        closing delimiter equal to the opening one
 */
export class FrontmatterScanner {
	private state: ScanState = "searching";
	private delimiter: FrontmatterDelimiter | null = null;
	private lineNo = 0;
	private readonly metaLines: string[] = [];
	private readonly bodyLines: string[] = [];

	push(line: string): void {
		this.lineNo++;

		if (this.state === "body") {
			this.bodyLines.push(line);
			return;
		}

		const trimmed = trimSpace(line);

		// Blank lines ahead of the opening delimiter are dropped.
		if (this.state === "searching" && trimmed === "") return;

		const delim = asDelimiter(trimmed);
		if (delim) {
			if (this.delimiter === null) {
				this.delimiter = delim;
				this.state = "frontmatter";
				return;
			}
			if (delim !== this.delimiter) {
				throw new MismatchedDelimiterError(this.delimiter, delim, this.lineNo);
			}
			this.state = "body";
			return;
		}

		if (this.state === "frontmatter") {
			this.metaLines.push(line);
			return;
		}

		this.state = "body";
		this.bodyLines.push(line);
	}

	finish(): { block: string | null; body: string } {
		if (this.state === "frontmatter" && this.delimiter) {
			throw new ClosingDelimiterNotFoundError(this.delimiter);
		}
		return {
			block: this.delimiter ? joinLines(this.metaLines) : null,
			body: joinLines(this.bodyLines),
		};
	}
}

function joinLines(lines: string[]): string {
	return lines.map((l) => `${l}\n`).join("");
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Separate a leading `---` or `+++` block from the rest of the document.
 * Every body line comes back newline-terminated. `block` is null when the
 * document does not open with a delimiter.
 */
export function splitFrontmatter(input: string | Iterable<string>): {
	block: string | null;
	body: string;
} {
	const lines = typeof input === "string" ? splitLines(input) : input;
	const scanner = new FrontmatterScanner();
	for (const line of lines) {
		scanner.push(line);
	}
	return scanner.finish();
}

export function parseFrontmatter<T>(
	input: string | Iterable<string>,
	decoder: FrontmatterDecoder<T>,
): ParsedFrontmatter<T> {
	const { block, body } = splitFrontmatter(input);
	if (block === null) return { meta: undefined, body };

	let meta: T;
	try {
		meta = decoder.decode(block);
	} catch (err) {
		throw new FrontmatterDecodeError(err);
	}
	return { meta, body };
}
