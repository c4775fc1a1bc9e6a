import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import type { LanguageModel } from "ai";

const DEFAULT_OLLAMA_URL = "http://localhost:11434";

// ─── Lazy provider factories (created on first use) ───────────────────────────

let _openAI: ReturnType<typeof createOpenAI> | null = null;
let _anthropic: ReturnType<typeof createAnthropic> | null = null;
let _google: ReturnType<typeof createGoogleGenerativeAI> | null = null;

function openAIKey(): string | undefined {
	// OPENAI_SECRET is the older name some setups still export
	return process.env.OPENAI_API_KEY || process.env.OPENAI_SECRET;
}

function googleKey(): string | undefined {
	return process.env.GOOGLE_API_KEY || process.env.GEMINI_API_KEY;
}

function openAI() {
	if (!_openAI) {
		const key = openAIKey();
		if (!key) throw new Error("OPENAI_API_KEY is not set");
		_openAI = createOpenAI({ apiKey: key });
	}
	return _openAI;
}

function anthropic() {
	if (!_anthropic) {
		const key = process.env.ANTHROPIC_API_KEY;
		if (!key) throw new Error("ANTHROPIC_API_KEY is not set");
		_anthropic = createAnthropic({ apiKey: key });
	}
	return _anthropic;
}

function google() {
	if (!_google) {
		const key = googleKey();
		if (!key) throw new Error("GOOGLE_API_KEY or GEMINI_API_KEY is not set");
		_google = createGoogleGenerativeAI({ apiKey: key });
	}
	return _google;
}

function ollama() {
	const base = process.env.OLLAMA_BASE_URL ?? DEFAULT_OLLAMA_URL;
	// Ollama serves an OpenAI-compatible API under /v1
	return createOpenAICompatible({
		name: "ollama",
		baseURL: `${base.replace(/\/+$/, "")}/v1`,
	});
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Split "<provider>/<model-id>" into its parts. The model id may itself
 * contain slashes.
 */
export function parseModelString(modelString: string): {
	provider: string;
	modelId: string;
} {
	const slashIdx = modelString.indexOf("/");
	if (slashIdx <= 0 || slashIdx === modelString.length - 1) {
		throw new Error(
			`Invalid model string "${modelString}". Expected format: "<provider>/<model-id>"`,
		);
	}
	return {
		provider: modelString.slice(0, slashIdx),
		modelId: modelString.slice(slashIdx + 1),
	};
}

/**
 * Resolve a model string to a LanguageModel.
 *
 * Providers:
 *   openai/<model>      – OpenAI chat completions (requires OPENAI_API_KEY)
 *   anthropic/<model>   – Anthropic (requires ANTHROPIC_API_KEY)
 *   google/<model>      – Google (requires GOOGLE_API_KEY or GEMINI_API_KEY)
 *   ollama/<model>      – Local Ollama
 */
export function resolveModel(modelString: string): LanguageModel {
	const { provider, modelId } = parseModelString(modelString);

	switch (provider) {
		case "openai":
			return openAI().chat(modelId);

		case "anthropic":
			return anthropic()(modelId);

		case "google":
			return google()(modelId);

		case "ollama":
			return ollama()(modelId);

		default:
			throw new Error(
				`Unknown provider "${provider}". Supported: openai, anthropic, google, ollama`,
			);
	}
}

/**
 * Pick a default model from whichever provider the environment configures.
 */
export function autoDiscoverModel(): string {
	if (openAIKey()) return "openai/gpt-4o-mini";
	if (process.env.ANTHROPIC_API_KEY) return "anthropic/claude-3-5-haiku-latest";
	if (googleKey()) return "google/gemini-2.0-flash";
	// Always fall back to Ollama (may fail at request time if not running)
	return "ollama/llama3.2";
}

export function availableProviders(): string[] {
	const providers: string[] = [];
	if (openAIKey()) providers.push("openai");
	if (process.env.ANTHROPIC_API_KEY) providers.push("anthropic");
	if (googleKey()) providers.push("google");
	providers.push("ollama"); // always listed (local)
	return providers;
}
