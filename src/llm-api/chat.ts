import type { LanguageModel, ModelMessage } from "ai";
import { runCompletion } from "./completion.ts";
import { resolveModel } from "./providers.ts";
import type { CompletionFn, CompletionSettings } from "./types.ts";

export interface ChatOptions {
	/** Cap on generated tokens, unless a call sets its own */
	maxOutputTokens?: number;
	/** User messages sent ahead of every prompt */
	contextMessages?: string[];
	complete?: CompletionFn;
	resolve?: (modelString: string) => LanguageModel;
}

export interface Usage {
	inputTokens: number;
	outputTokens: number;
}

/** Anything that can turn a rendered prompt into streamed answer text. */
export interface ChatStreamer {
	stream(prompt: string, settings: CompletionSettings): AsyncIterable<string>;
	/** Token usage of the most recent completed stream, when known */
	readonly lastUsage?: Usage | null;
}

export class Chat implements ChatStreamer {
	private readonly complete: CompletionFn;
	private readonly resolve: (modelString: string) => LanguageModel;
	private readonly baseMessages: ModelMessage[];
	private readonly maxOutputTokens: number | undefined;

	lastUsage: Usage | null = null;

	constructor(opts: ChatOptions = {}) {
		this.complete = opts.complete ?? runCompletion;
		this.resolve = opts.resolve ?? resolveModel;
		this.maxOutputTokens = opts.maxOutputTokens;
		this.baseMessages = (opts.contextMessages ?? []).map(
			(content): ModelMessage => ({ role: "user", content }),
		);
	}

	/**
	 * Stream the answer to `prompt` as text chunks. The last chunk is always a
	 * lone "\n"; a failed completion throws its error instead.
	 */
	async *stream(
		prompt: string,
		settings: CompletionSettings,
	): AsyncGenerator<string> {
		const maxOutputTokens = settings.maxOutputTokens ?? this.maxOutputTokens;
		const events = this.complete({
			model: this.resolve(settings.model),
			messages: [...this.baseMessages, { role: "user", content: prompt }],
			...(settings.temperature !== undefined
				? { temperature: settings.temperature }
				: {}),
			...(maxOutputTokens !== undefined ? { maxOutputTokens } : {}),
		});

		for await (const event of events) {
			switch (event.type) {
				case "text-delta":
					yield event.delta;
					break;

				case "completion-done":
					this.lastUsage = {
						inputTokens: event.inputTokens,
						outputTokens: event.outputTokens,
					};
					yield "\n";
					return;

				case "completion-error":
					throw event.error;
			}
		}
	}
}
