import { ContentRejectedError, GenerationError, PublishError } from "../errors.js";
import type { RetryDecision } from "../infra/retry.js";
import { getHttpStatus, isTransientNetworkError } from "../infra/network-errors.js";

export type FailureCategory =
	| "network"
	| "timeout"
	| "rate-limited"
	| "server"
	| "generation"
	| "auth"
	| "malformed"
	| "content-policy"
	| "unknown";

export type PublishFailureClassification = RetryDecision & {
	category: FailureCategory;
};

function fromStatus(status: number, retryAfterMs: number | undefined): PublishFailureClassification {
	if (status === 429) {
		return { retriable: true, category: "rate-limited", retryAfterMs };
	}
	if (status >= 500) {
		return { retriable: true, category: "server", retryAfterMs };
	}
	if (status === 401 || status === 403) {
		return { retriable: false, category: "auth" };
	}
	if (status >= 400) {
		return { retriable: false, category: "malformed" };
	}
	return { retriable: false, category: "unknown" };
}

/**
 * Decide whether a generate/publish failure is worth another attempt.
 * Unknown errors are fatal: retrying something we cannot explain risks a
 * duplicate post.
 */
export function classifyPublishError(err: unknown): PublishFailureClassification {
	if (err instanceof ContentRejectedError) {
		return { retriable: false, category: "content-policy" };
	}
	if (err instanceof GenerationError) {
		return { retriable: true, category: "generation" };
	}
	if (err instanceof PublishError && err.status !== undefined) {
		return fromStatus(err.status, err.retryAfterMs);
	}
	const status = getHttpStatus(err);
	if (status !== undefined) {
		return fromStatus(status, undefined);
	}
	if (err instanceof Error && err.name === "TimeoutError") {
		return { retriable: true, category: "timeout" };
	}
	if (isTransientNetworkError(err)) {
		return { retriable: true, category: "network" };
	}
	return { retriable: false, category: "unknown" };
}
