// =============================================================================
// CLICK-BENCH - Model Invocation
// =============================================================================
// The model under test is reached through OpenRouter via the Vercel AI SDK.
// Provider errors are folded into the closed set the runner understands:
// rate-limited, bad-request, other.
// =============================================================================

import { createOpenRouter } from "@openrouter/ai-sdk-provider";
import {
	APICallError,
	RetryError,
	generateText,
	type LanguageModelV1,
} from "ai";
import pLimit from "p-limit";
import { SYSTEM_PROMPT } from "./prompts.ts";
import type { InvocationError, ModelInvoker } from "./types.ts";

/**
 * Represents the model under test
 */
export type BenchmarkModel = {
	name: string;
	llm: LanguageModelV1;
};

export type GenerationSettings = {
	maxTokens: number;
	temperature: number;
	timeoutSeconds: number;
};

export function createBenchmarkModel(
	modelName: string,
	apiKey: string,
): BenchmarkModel {
	const openrouter = createOpenRouter({ apiKey });
	return {
		name: modelName,
		llm: openrouter(modelName),
	};
}

export function classifyInvocationError(error: unknown): InvocationError {
	if (RetryError.isInstance(error)) {
		return classifyInvocationError(error.lastError);
	}

	const message = error instanceof Error ? error.message : String(error);

	if (APICallError.isInstance(error)) {
		if (error.statusCode === 429) {
			return { kind: "rate-limited", message };
		}
		if (error.statusCode === 400) {
			return { kind: "bad-request", message };
		}
	}

	return { kind: "other", message };
}

/**
 * Builds the batch invoker for a model. Each prompt becomes one chat request
 * (system prompt + user message); at most `concurrency` run at once and the
 * responses come back in prompt order. The first failing request fails the
 * whole batch: it aborts the requests still running, and the invoker only
 * returns once every started request has settled.
 */
export function createModelInvoker(
	model: BenchmarkModel,
	settings: GenerationSettings,
): ModelInvoker {
	return async (prompts, concurrency) => {
		const limit = pLimit(Math.max(1, concurrency));
		const batch = new AbortController();

		const settled = await Promise.allSettled(
			prompts.map((prompt) =>
				limit(async () => {
					batch.signal.throwIfAborted();
					try {
						const response = await generateText({
							model: model.llm,
							system: SYSTEM_PROMPT,
							prompt,
							maxTokens: settings.maxTokens,
							temperature: settings.temperature,
							// Retries are batch-scoped and owned by the runner.
							maxRetries: 0,
							abortSignal: AbortSignal.any([
								batch.signal,
								AbortSignal.timeout(settings.timeoutSeconds * 1000),
							]),
						});
						return response.text;
					} catch (error) {
						if (!batch.signal.aborted) {
							batch.abort(error);
						}
						throw error;
					}
				}),
			),
		);

		if (batch.signal.aborted) {
			// The abort reason is the request failure that started it.
			return { ok: false, error: classifyInvocationError(batch.signal.reason) };
		}

		const responses: string[] = [];
		for (const outcome of settled) {
			if (outcome.status === "rejected") {
				return { ok: false, error: classifyInvocationError(outcome.reason) };
			}
			responses.push(outcome.value);
		}
		return { ok: true, responses };
	};
}
