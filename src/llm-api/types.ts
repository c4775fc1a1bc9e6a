import type { LanguageModel, ModelMessage } from "ai";

// ─── Completion request ───────────────────────────────────────────────────────

export interface CompletionRequest {
	model: LanguageModel;
	messages: ModelMessage[];
	temperature?: number;
	maxOutputTokens?: number;
}

/** Per-call settings, usually taken from a template's frontmatter. */
export interface CompletionSettings {
	/** "<provider>/<model-id>" */
	model: string;
	temperature?: number;
	maxOutputTokens?: number;
}

// ─── Completion events (streamed to the caller) ───────────────────────────────

export interface TextDeltaEvent {
	type: "text-delta";
	delta: string;
}

export interface CompletionDoneEvent {
	type: "completion-done";
	inputTokens: number;
	outputTokens: number;
}

export interface CompletionErrorEvent {
	type: "completion-error";
	error: Error;
}

export type CompletionEvent =
	| TextDeltaEvent
	| CompletionDoneEvent
	| CompletionErrorEvent;

export type CompletionFn = (
	request: CompletionRequest,
) => AsyncIterable<CompletionEvent>;
