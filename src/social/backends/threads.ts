import type { ThreadsConfig } from "../../config/config.js";
import { ConfigError, PublishError } from "../../errors.js";
import { formatErrorSafe } from "../../infra/network-errors.js";
import { type FetchLike, fetchWithTimeout } from "../../infra/timeout.js";
import { getChildLogger } from "../../logging.js";
import { sleep as defaultSleep } from "../../utils.js";
import type { PublishResult, Publisher } from "../types.js";

const logger = getChildLogger({ module: "threads-backend" });

/**
 * Truncate text to the platform limit.
 * Code-point safe (Array.from) so surrogate pairs are never split; prefers a
 * word boundary when one is reasonably close to the limit.
 */
export function truncateForThreads(text: string, maxLength: number): string {
	const codePoints = Array.from(text);
	if (codePoints.length <= maxLength) return text;
	logger.warn({ length: codePoints.length, max: maxLength }, "post exceeded char limit, truncating");
	const cut = codePoints.slice(0, maxLength - 1).join("");
	const lastSpace = cut.lastIndexOf(" ");
	const breakpoint = lastSpace > maxLength * 0.6 ? lastSpace : cut.length;
	return `${cut.slice(0, breakpoint)}…`;
}

/**
 * Parse a Retry-After header: delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, nowMs = Date.now()): number | undefined {
	if (!value) return undefined;
	const trimmed = value.trim();
	if (/^\d+$/.test(trimmed)) {
		return Number(trimmed) * 1000;
	}
	const at = Date.parse(trimmed);
	if (Number.isNaN(at)) return undefined;
	return Math.max(0, at - nowMs);
}

type ThreadsIdResponse = {
	id?: unknown;
	error?: { message?: unknown; code?: unknown };
};

function safeJsonParse(input: string): unknown {
	try {
		return JSON.parse(input);
	} catch {
		return null;
	}
}

function isIdResponse(value: unknown): value is ThreadsIdResponse {
	return typeof value === "object" && value !== null;
}

function describeFailure(payload: unknown, raw: string, statusText: string): string {
	if (isIdResponse(payload) && payload.error && typeof payload.error.message === "string") {
		return payload.error.message;
	}
	return raw.slice(0, 200) || statusText;
}

export type ThreadsPublisherOptions = {
	accessToken: string;
	userId: string;
	baseUrl: string;
	timeoutMs: number;
	/** Wait between creating the container and publishing it. */
	publishDelayMs: number;
	maxLength: number;
	fetchImpl?: FetchLike;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Threads Graph API client: create a TEXT media container, wait for it to
 * become ready, then publish it.
 */
export class ThreadsPublisher implements Publisher {
	readonly serviceId = "threads";
	private readonly options: ThreadsPublisherOptions;
	private readonly fetchImpl: FetchLike;
	private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

	constructor(options: ThreadsPublisherOptions) {
		this.options = { ...options, baseUrl: options.baseUrl.replace(/\/+$/, "") };
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.sleep = options.sleep ?? defaultSleep;
	}

	private async post(
		path: string,
		params: Record<string, string>,
		signal: AbortSignal | undefined,
	): Promise<string | undefined> {
		const query = new URLSearchParams({ ...params, access_token: this.options.accessToken });
		const url = `${this.options.baseUrl}/${encodeURIComponent(this.options.userId)}/${path}?${query}`;

		let response: Response;
		try {
			response = await fetchWithTimeout(
				url,
				{ method: "POST", signal },
				this.options.timeoutMs,
				this.fetchImpl,
			);
		} catch (err) {
			throw new PublishError(`threads ${path} request failed: ${formatErrorSafe(err)}`, {
				cause: err,
			});
		}

		const raw = await response.text();
		const payload = raw ? safeJsonParse(raw) : null;

		if (!response.ok) {
			throw new PublishError(
				`threads ${path} failed (${response.status}): ${describeFailure(payload, raw, response.statusText)}`,
				{
					status: response.status,
					retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
				},
			);
		}

		const id = isIdResponse(payload) ? payload.id : undefined;
		return typeof id === "string" && id.length > 0 ? id : undefined;
	}

	async publish(text: string, signal?: AbortSignal): Promise<PublishResult> {
		const body = truncateForThreads(text, this.options.maxLength);

		const containerId = await this.post("threads", { media_type: "TEXT", text: body }, signal);
		if (!containerId) {
			// Nothing was created yet, so a retry is safe
			throw new PublishError("threads threads returned no id", { status: 502 });
		}
		logger.debug({ containerId }, "threads container created");

		if (this.options.publishDelayMs > 0) {
			await this.sleep(this.options.publishDelayMs, signal);
		}

		const mediaId = await this.post("threads_publish", { creation_id: containerId }, signal);
		if (!mediaId) {
			// A 2xx here means the post is live; retrying would post it twice
			logger.warn({ containerId }, "threads_publish returned no id; using container id");
		}
		const postId = mediaId ?? containerId;
		logger.info({ postId }, "threads post published");
		return { postId, text: body };
	}
}

/**
 * Build a publisher from config. `THREADS_ACCESS_TOKEN` takes precedence over
 * the config file.
 */
export function createThreadsPublisher(
	config: ThreadsConfig,
	overrides?: Pick<ThreadsPublisherOptions, "fetchImpl" | "sleep">,
): ThreadsPublisher {
	const accessToken = process.env.THREADS_ACCESS_TOKEN ?? config.accessToken;
	if (!accessToken) {
		throw new ConfigError("threads publisher is not configured", [
			"set THREADS_ACCESS_TOKEN or threads.accessToken",
		]);
	}
	return new ThreadsPublisher({
		accessToken,
		userId: config.userId,
		baseUrl: config.baseUrl,
		timeoutMs: config.timeoutMs,
		publishDelayMs: config.publishDelayMs,
		maxLength: config.maxLength,
		...overrides,
	});
}
