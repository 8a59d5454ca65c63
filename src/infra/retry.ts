import { sleep as defaultSleep } from "../utils.js";

export type RetryConfig = {
	/** Maximum number of attempts (including the first). Must be >= 1. */
	maxAttempts: number;
	/** Base delay in milliseconds before the first retry. */
	baseDelayMs: number;
	/** Maximum delay cap in milliseconds. */
	maxDelayMs: number;
	/** Exponential backoff factor. Default: 2. */
	factor: number;
	/** Jitter factor (0–1). Randomizes delay by ±jitter. Default: 0.25. */
	jitter: number;
};

export type RetryOptions = Partial<RetryConfig> & {
	/** Predicate: return true if the error is retryable. Defaults to always-retry. */
	shouldRetry?: (err: unknown, info: RetryInfo) => boolean;
	/** Called before each retry sleep. Useful for logging. */
	onRetry?: (err: unknown, info: RetryInfo) => void;
	/** If the error provides a server-suggested retry delay (ms), use it. */
	retryAfterMs?: (err: unknown) => number | undefined;
	/** Optional label for logging / error messages. */
	label?: string;
	/** Upper bound for the next backoff sleep (e.g. time left in a budget). */
	maxWaitMs?: () => number | undefined;
	/** Checked after each backoff sleep; returning false ends the sequence. */
	beforeAttempt?: (attempt: number) => boolean;
	/** Aborting stops further attempts; the current one is not interrupted. */
	signal?: AbortSignal;
	/** Sleep used between attempts (tests pass a fake). */
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
	/** Source for jitter in [0, 1). */
	random?: () => number;
};

export type RetryInfo = {
	/** 1-based attempt number that just failed. */
	attempt: number;
	/** Total attempts allowed. */
	maxAttempts: number;
	/** Delay before the next attempt (ms). */
	delayMs: number;
};

const DEFAULT_CONFIG: RetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 1000,
	maxDelayMs: 60_000,
	factor: 2,
	jitter: 0.25,
};

export function resolveRetryConfig(opts?: Partial<RetryConfig>): RetryConfig {
	return {
		maxAttempts: Math.max(1, opts?.maxAttempts ?? DEFAULT_CONFIG.maxAttempts),
		baseDelayMs: Math.max(0, opts?.baseDelayMs ?? DEFAULT_CONFIG.baseDelayMs),
		maxDelayMs: Math.max(0, opts?.maxDelayMs ?? DEFAULT_CONFIG.maxDelayMs),
		factor: Math.max(1, opts?.factor ?? DEFAULT_CONFIG.factor),
		jitter: Math.min(1, Math.max(0, opts?.jitter ?? DEFAULT_CONFIG.jitter)),
	};
}

/**
 * Compute backoff delay for a given attempt (1-based).
 */
export function computeRetryDelay(
	config: RetryConfig,
	attempt: number,
	random: () => number = Math.random,
): number {
	const base = config.baseDelayMs * config.factor ** (attempt - 1);
	const capped = Math.min(base, config.maxDelayMs);
	const jitterRange = capped * config.jitter;
	const jitter = (random() - 0.5) * 2 * jitterRange;
	return Math.max(0, Math.round(capped + jitter));
}

/**
 * Retry an async operation with exponential backoff and jitter.
 *
 * @example
 * ```ts
 * const postId = await retryAsync(() => publisher.publish(text), {
 *   maxAttempts: 3,
 *   baseDelayMs: 1000,
 *   shouldRetry: (err) => isTransientNetworkError(err),
 *   onRetry: (err, info) => logger.warn({ attempt: info.attempt }, "retrying"),
 * });
 * ```
 */
export async function retryAsync<T>(
	fn: (attempt: number) => Promise<T>,
	opts?: RetryOptions,
): Promise<T> {
	const config = resolveRetryConfig(opts);
	const { shouldRetry, onRetry, retryAfterMs, maxWaitMs, beforeAttempt, label, signal } = opts ?? {};
	const sleep = opts?.sleep ?? defaultSleep;

	let lastError: unknown;

	for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
		try {
			return await fn(attempt);
		} catch (err) {
			lastError = err;

			if (attempt >= config.maxAttempts || signal?.aborted) {
				break;
			}

			const info: RetryInfo = {
				attempt,
				maxAttempts: config.maxAttempts,
				delayMs: 0, // filled below
			};

			if (shouldRetry && !shouldRetry(err, info)) {
				break;
			}

			// A server-suggested delay is honoured as given; maxDelayMs only caps backoff
			const serverDelay = retryAfterMs?.(err);
			let delay =
				serverDelay !== undefined && serverDelay > 0
					? serverDelay
					: computeRetryDelay(config, attempt, opts?.random);
			const waitLimit = maxWaitMs?.();
			if (waitLimit !== undefined) {
				delay = Math.min(delay, Math.max(0, waitLimit));
			}
			info.delayMs = delay;

			onRetry?.(err, info);

			if (delay > 0) {
				await sleep(delay, signal);
			}
			if (signal?.aborted || (beforeAttempt && !beforeAttempt(attempt + 1))) {
				break;
			}
		}
	}

	const prefix = label ? `${label}: ` : "";
	throw lastError ?? new Error(`${prefix}retryAsync exhausted ${config.maxAttempts} attempts`);
}

/** What a classifier says about one failure. */
export type RetryDecision = {
	retriable: boolean;
	/** Server-suggested delay before the next attempt. */
	retryAfterMs?: number;
};

export type WithRetryOptions<C extends RetryDecision> = Omit<
	RetryOptions,
	"shouldRetry" | "retryAfterMs" | "beforeAttempt"
> & {
	classify: (err: unknown) => C;
	/**
	 * Checked before each backoff sleep and again before the next attempt;
	 * returning false ends the sequence (e.g. budget spent).
	 */
	canRetry?: () => boolean;
};

export type RetryResult<T, C extends RetryDecision = RetryDecision> =
	| { ok: true; value: T; attempts: number }
	| {
			ok: false;
			error: unknown;
			attempts: number;
			classification: C;
			/** Attempts ran out while the last error was still retriable. */
			exhausted: boolean;
	  };

/**
 * retryAsync with a classifier, returning a typed result instead of throwing.
 * Retriable errors are retried until attempts run out; anything else stops
 * immediately.
 */
export async function withRetry<T, C extends RetryDecision>(
	action: (attempt: number) => Promise<T>,
	options: WithRetryOptions<C>,
): Promise<RetryResult<T, C>> {
	const { classify, canRetry, ...retryOptions } = options;
	let attempts = 0;
	let lastClassification: C | null = null;

	const classifyOnce = (err: unknown): C => {
		lastClassification = classify(err);
		return lastClassification;
	};

	try {
		const value = await retryAsync(
			(attempt) => {
				attempts = attempt;
				return action(attempt);
			},
			{
				...retryOptions,
				shouldRetry: (err) => classifyOnce(err).retriable && (canRetry?.() ?? true),
				retryAfterMs: () => lastClassification?.retryAfterMs,
				beforeAttempt: () => canRetry?.() ?? true,
			},
		);
		return { ok: true, value, attempts };
	} catch (err) {
		// The final failure skips shouldRetry, so classify it here
		const classification = classifyOnce(err);
		return {
			ok: false,
			error: err,
			attempts,
			classification,
			exhausted: classification.retriable && attempts >= resolveRetryConfig(retryOptions).maxAttempts,
		};
	}
}
