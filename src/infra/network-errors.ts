/**
 * Error inspection helpers for outbound calls.
 *
 * Errors from fetch/undici and from SDKs wrap the useful part several levels
 * deep (`cause`, `reason`, AggregateError `errors`), so every check here walks
 * the whole chain breadth-first.
 */

/** Error codes that indicate a transient network issue. */
const TRANSIENT_NETWORK_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

const TRANSIENT_MESSAGE_PATTERNS: RegExp[] = [
	/fetch failed/i,
	/network error/i,
	/socket hang up/i,
	/other side closed/i,
	/client network socket disconnected/i,
	/request to .* failed/i,
	/\b(ECONNRESET|ETIMEDOUT|ECONNREFUSED|EPIPE)\b/,
	/timed out after/i,
];

const ABORT_MESSAGE_PATTERNS: RegExp[] = [
	/this operation was aborted/i,
	/the operation was aborted/i,
	/signal is aborted/i,
];

type ErrorLike = {
	name?: unknown;
	message?: unknown;
	code?: unknown;
	status?: unknown;
	cause?: unknown;
	reason?: unknown;
	errors?: unknown;
};

function isErrorLike(value: unknown): value is ErrorLike {
	return typeof value === "object" && value !== null;
}

/**
 * Collect every error reachable from `err` through `cause`, `reason` and
 * `errors`, in breadth-first order. Cycles are visited once.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	for (let item = queue.shift(); item; item = queue.shift()) {
		if (item.depth > maxDepth || item.value == null) continue;

		const value = item.value;
		if (!isErrorLike(value)) {
			candidates.push(value);
			continue;
		}
		if (seen.has(value)) continue;
		seen.add(value);
		candidates.push(value);

		const depth = item.depth + 1;
		if (value.cause != null) queue.push({ value: value.cause, depth });
		if (value.reason != null) queue.push({ value: value.reason, depth });
		if (Array.isArray(value.errors)) {
			for (const nested of value.errors) {
				queue.push({ value: nested, depth });
			}
		}
	}

	return candidates;
}

function extractMessage(value: unknown): string | null {
	if (typeof value === "string") return value;
	if (isErrorLike(value) && typeof value.message === "string") return value.message;
	return null;
}

/**
 * True when `err` (or anything in its cause chain) looks like a temporary
 * network condition. TimeoutError counts as transient.
 */
export function isTransientNetworkError(err: unknown): boolean {
	return collectErrorCandidates(err).some((candidate) => {
		if (isErrorLike(candidate)) {
			if (typeof candidate.code === "string" && TRANSIENT_NETWORK_CODES.has(candidate.code)) {
				return true;
			}
			if (candidate.name === "TimeoutError") return true;
		}
		const message = extractMessage(candidate);
		return message !== null && TRANSIENT_MESSAGE_PATTERNS.some((pattern) => pattern.test(message));
	});
}

/** True for AbortError / ABORT_ERR anywhere in the chain (shutdown, cancellation). */
export function isAbortError(err: unknown): boolean {
	return collectErrorCandidates(err).some((candidate) => {
		if (isErrorLike(candidate) && (candidate.name === "AbortError" || candidate.code === "ABORT_ERR")) {
			return true;
		}
		const message = extractMessage(candidate);
		return message !== null && ABORT_MESSAGE_PATTERNS.some((pattern) => pattern.test(message));
	});
}

/** First numeric HTTP `status` found in the chain (SDK errors carry one). */
export function getHttpStatus(err: unknown): number | undefined {
	for (const candidate of collectErrorCandidates(err)) {
		if (isErrorLike(candidate) && typeof candidate.status === "number") {
			return candidate.status;
		}
	}
	return undefined;
}

/**
 * Format an error for logs. URLs and access tokens are redacted since the
 * platform API accepts tokens as query/body parameters.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	if (err instanceof Error) {
		let msg = `${err.name}: ${err.message}`;
		if (err.cause) {
			msg += ` [cause: ${formatErrorSafe(err.cause, Math.floor(maxLength / 2))}]`;
		}
		return truncate(redactSecrets(msg), maxLength);
	}
	return truncate(redactSecrets(String(err)), maxLength);
}

export function redactSecrets(str: string): string {
	return str
		.replace(/https?:\/\/[^\s]+/g, "[URL]")
		.replace(/(access_token|api_key|apikey)=([^&\s]+)/gi, "$1=[REDACTED]")
		.replace(/Bearer\s+[A-Za-z0-9._~+/-]+=*/g, "Bearer [REDACTED]");
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
