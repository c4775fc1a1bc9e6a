import { streamText } from "ai";
import { logError } from "../cli/error-log.ts";
import type { CompletionEvent, CompletionRequest } from "./types.ts";

/**
 * Stream a single chat completion.
 *
 * Yields text deltas as they arrive, then a final CompletionDoneEvent
 * (or CompletionErrorEvent on failure).
 */
export async function* runCompletion(
	request: CompletionRequest,
): AsyncGenerator<CompletionEvent> {
	const { model, messages, temperature, maxOutputTokens } = request;

	let inputTokens = 0;
	let outputTokens = 0;

	try {
		const result = streamText({
			model,
			messages,
			...(temperature !== undefined ? { temperature } : {}),
			...(maxOutputTokens !== undefined ? { maxOutputTokens } : {}),
			onError: ({ error }) => logError(error, "stream"),
		});

		for await (const part of result.fullStream) {
			switch (part.type) {
				case "text-delta": {
					if (part.text) yield { type: "text-delta", delta: part.text };
					break;
				}

				case "finish": {
					inputTokens = part.totalUsage.inputTokens ?? 0;
					outputTokens = part.totalUsage.outputTokens ?? 0;
					break;
				}

				case "error": {
					const err = part.error;
					throw err instanceof Error ? err : new Error(String(err));
				}
			}
		}

		yield { type: "completion-done", inputTokens, outputTokens };
	} catch (err) {
		yield {
			type: "completion-error",
			error: err instanceof Error ? err : new Error(String(err)),
		};
	}
}
