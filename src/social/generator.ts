/**
 * OpenAI-backed content generator.
 *
 * API key resolution order:
 * 1. OPENAI_API_KEY environment variable
 * 2. openai.apiKey in config file
 */

import OpenAI, { APIError } from "openai";

import type { OpenAIConfig, PersonaConfig } from "../config/config.js";
import { ConfigError, ContentRejectedError, GenerationError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import type { ContentGenerator, GenerationContext } from "./types.js";

const logger = getChildLogger({ module: "content-generator" });

const REQUEST_TIMEOUT_MS = 60_000;

/** The one SDK call the generator makes; tests pass a fake. */
export type CreateChatCompletion = (
	body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
	options?: { signal?: AbortSignal },
) => Promise<OpenAI.Chat.Completions.ChatCompletion>;

export function resolveOpenAIKey(config: OpenAIConfig): string | null {
	return process.env.OPENAI_API_KEY ?? config.apiKey ?? null;
}

export function buildUserPrompt(context: GenerationContext): string {
	const lines = [
		`It is ${context.localTime}${context.isPrimeTime ? " (evening peak)" : ""}.`,
		"Write the next post.",
	];
	if (context.recentPosts.length > 0) {
		lines.push("", "Your recent posts (do not repeat their topic or wording):");
		for (const post of context.recentPosts) {
			lines.push(`- ${post}`);
		}
	}
	return lines.join("\n");
}

/** Trim whitespace and one layer of wrapping quotes the model sometimes adds. */
export function cleanGeneratedText(text: string): string {
	const trimmed = text.trim();
	const quoted = /^["“'](.*)["”']$/s.exec(trimmed);
	return (quoted ? quoted[1] : trimmed).trim();
}

function isContentPolicyError(err: APIError): boolean {
	return err.code === "content_policy_violation" || /content (management )?policy/i.test(err.message);
}

export class OpenAIContentGenerator implements ContentGenerator {
	constructor(
		private readonly createCompletion: CreateChatCompletion,
		private readonly config: OpenAIConfig,
		private readonly persona: PersonaConfig,
	) {}

	async generate(context: GenerationContext, signal?: AbortSignal): Promise<string> {
		let completion: OpenAI.Chat.Completions.ChatCompletion;
		try {
			completion = await this.createCompletion(
				{
					model: this.config.model,
					temperature: this.config.temperature,
					max_tokens: this.config.maxTokens,
					messages: [
						{ role: "system", content: this.persona.prompt },
						{ role: "user", content: buildUserPrompt(context) },
					],
				},
				{ signal },
			);
		} catch (err) {
			throw this.translateError(err);
		}

		const choice = completion.choices[0];
		if (choice?.finish_reason === "content_filter") {
			throw new ContentRejectedError("completion stopped by content filter");
		}
		const text = cleanGeneratedText(choice?.message.content ?? "");
		if (!text) {
			throw new GenerationError("model returned empty content");
		}

		logger.debug({ slotIndex: context.slotIndex, length: text.length }, "generated post text");
		return text;
	}

	private translateError(err: unknown): unknown {
		if (!(err instanceof APIError)) {
			return new GenerationError(`generation failed: ${String(err)}`, { cause: err });
		}
		if (err.status === 400 && isContentPolicyError(err)) {
			return new ContentRejectedError(err.message, { cause: err });
		}
		// No status means the request never got an answer (connection, timeout)
		if (err.status === undefined || err.status === 429 || err.status >= 500) {
			return new GenerationError(`generation failed: ${err.message}`, { cause: err });
		}
		// Remaining 4xx (auth, bad model name) keep their status for classification
		return err;
	}
}

/**
 * Build the generator from config. Retries are handled by the execution loop,
 * so the SDK's own retry is disabled.
 */
export function createOpenAIContentGenerator(
	config: OpenAIConfig,
	persona: PersonaConfig,
): OpenAIContentGenerator {
	const apiKey = resolveOpenAIKey(config);
	if (!apiKey) {
		throw new ConfigError("content generator is not configured", [
			"set OPENAI_API_KEY or openai.apiKey",
		]);
	}
	const client = new OpenAI({
		apiKey,
		baseURL: config.baseUrl,
		timeout: REQUEST_TIMEOUT_MS,
		maxRetries: 0,
	});
	logger.debug(
		{ hasCustomBaseUrl: Boolean(config.baseUrl), model: config.model },
		"OpenAI client initialized",
	);
	return new OpenAIContentGenerator(
		(body, options) => client.chat.completions.create(body, options),
		config,
		persona,
	);
}
